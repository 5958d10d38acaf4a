import type { CpuFeatures, Mnemonic } from './mnemonics.js';
import type { Operand } from './operand.js';

export const REGISTERS = ['A', 'X', 'Y', 'Z'] as const;
export const FLAGS = ['C', 'N', 'Z', 'V'] as const;

export type Register = (typeof REGISTERS)[number];
export type Flag = (typeof FLAGS)[number];

/**
 * A tracked register or flag. Register Z (45GS02) and the zero flag are distinct resources.
 */
export type Resource = `reg:${Register}` | `flag:${Flag}`;

export type EffectKind =
  | 'load'
  | 'store'
  | 'transfer'
  | 'alu'
  | 'shift'
  | 'compare'
  | 'branch'
  | 'jump'
  | 'call'
  | 'return'
  | 'stack'
  | 'flag'
  | 'other';

/**
 * What one instruction does to the tracked registers and flags.
 */
export interface InstructionEffect {
  kind: EffectKind;
  /** Resources whose incoming value the instruction observes. */
  reads: readonly Resource[];
  /** Resources the instruction fully overwrites. */
  writes: readonly Resource[];
  /** Resources that may change but are not reliably overwritten (width changes, masked flag updates). */
  disturbs: readonly Resource[];
  /** Flag results known statically (`CLC` → C clear, `LSR` → N clear). */
  flagResults: Partial<Record<Flag, boolean>>;
  /** Register-to-register copy. */
  transfer?: { from: Register; to: Register };
  /** Leaves the straight-line stream (branch, jump, call, return, software interrupt). */
  controlTransfer: boolean;
  /** Never falls through to the next record. */
  terminator: boolean;
}

interface EffectTemplate {
  kind: EffectKind;
  reads: string;
  writes: string;
  disturbs?: string;
  flagResults?: Partial<Record<Flag, boolean>>;
  transfer?: { from: Register; to: Register };
  terminator?: boolean;
}

// Compact resource lists: upper case A/X/Y/Z are registers, lower case c/n/z/v are flags.
const CODES: ReadonlyMap<string, Resource> = new Map<string, Resource>([
  ['A', 'reg:A'],
  ['X', 'reg:X'],
  ['Y', 'reg:Y'],
  ['Z', 'reg:Z'],
  ['c', 'flag:C'],
  ['n', 'flag:N'],
  ['z', 'flag:Z'],
  ['v', 'flag:V'],
]);

function resources(spec: string): Resource[] {
  const out: Resource[] = [];
  for (const ch of spec) {
    const r = CODES.get(ch);
    if (r !== undefined) out.push(r);
  }
  return out;
}

const t = (
  kind: EffectKind,
  reads: string,
  writes: string,
  extra: Omit<EffectTemplate, 'kind' | 'reads' | 'writes'> = {},
): EffectTemplate => ({ kind, reads, writes, ...extra });

const TABLE: Readonly<Record<Mnemonic, EffectTemplate>> = {
  // 6502
  ADC: t('alu', 'Ac', 'Anzcv'),
  AND: t('alu', 'A', 'Anz'),
  ASL: t('shift', '', 'nzc'),
  BCC: t('branch', 'c', ''),
  BCS: t('branch', 'c', ''),
  BEQ: t('branch', 'z', ''),
  BIT: t('compare', 'A', 'nzv'),
  BMI: t('branch', 'n', ''),
  BNE: t('branch', 'z', ''),
  BPL: t('branch', 'n', ''),
  BRK: t('call', 'cnzv', ''),
  BVC: t('branch', 'v', ''),
  BVS: t('branch', 'v', ''),
  CLC: t('flag', '', 'c', { flagResults: { C: false } }),
  CLD: t('flag', '', ''),
  CLI: t('flag', '', ''),
  CLV: t('flag', '', 'v', { flagResults: { V: false } }),
  CMP: t('compare', 'A', 'nzc'),
  CPX: t('compare', 'X', 'nzc'),
  CPY: t('compare', 'Y', 'nzc'),
  DEC: t('alu', '', 'nz'),
  DEX: t('alu', 'X', 'Xnz'),
  DEY: t('alu', 'Y', 'Ynz'),
  EOR: t('alu', 'A', 'Anz'),
  INC: t('alu', '', 'nz'),
  INX: t('alu', 'X', 'Xnz'),
  INY: t('alu', 'Y', 'Ynz'),
  JMP: t('jump', '', '', { terminator: true }),
  JSR: t('call', '', ''),
  LDA: t('load', '', 'Anz'),
  LDX: t('load', '', 'Xnz'),
  LDY: t('load', '', 'Ynz'),
  LSR: t('shift', '', 'nzc', { flagResults: { N: false } }),
  NOP: t('other', '', ''),
  ORA: t('alu', 'A', 'Anz'),
  PHA: t('stack', 'A', ''),
  PHP: t('stack', 'cnzv', ''),
  PLA: t('stack', '', 'Anz'),
  PLP: t('stack', '', 'cnzv'),
  ROL: t('shift', 'c', 'nzc'),
  ROR: t('shift', 'c', 'nzc'),
  RTI: t('return', '', 'cnzv', { terminator: true }),
  RTS: t('return', '', '', { terminator: true }),
  SBC: t('alu', 'Ac', 'Anzcv'),
  SEC: t('flag', '', 'c', { flagResults: { C: true } }),
  SED: t('flag', '', ''),
  SEI: t('flag', '', ''),
  STA: t('store', 'A', ''),
  STX: t('store', 'X', ''),
  STY: t('store', 'Y', ''),
  TAX: t('transfer', 'A', 'Xnz', { transfer: { from: 'A', to: 'X' } }),
  TAY: t('transfer', 'A', 'Ynz', { transfer: { from: 'A', to: 'Y' } }),
  TSX: t('transfer', '', 'Xnz'),
  TXA: t('transfer', 'X', 'Anz', { transfer: { from: 'X', to: 'A' } }),
  TXS: t('transfer', 'X', ''),
  TYA: t('transfer', 'Y', 'Anz', { transfer: { from: 'Y', to: 'A' } }),

  // 65C02
  BRA: t('branch', '', '', { terminator: true }),
  PHX: t('stack', 'X', ''),
  PHY: t('stack', 'Y', ''),
  PLX: t('stack', '', 'Xnz'),
  PLY: t('stack', '', 'Ynz'),
  STZ: t('store', '', ''),
  TRB: t('alu', 'A', 'z'),
  TSB: t('alu', 'A', 'z'),
  WAI: t('other', '', ''),
  STP: t('other', '', '', { terminator: true }),

  // 65816
  BRL: t('branch', '', '', { terminator: true }),
  COP: t('call', 'cnzv', ''),
  JML: t('jump', '', '', { terminator: true }),
  JSL: t('call', '', ''),
  MVN: t('other', 'AXY', 'AXY'),
  MVP: t('other', 'AXY', 'AXY'),
  PEA: t('stack', '', ''),
  PEI: t('stack', '', ''),
  PER: t('stack', '', ''),
  PHB: t('stack', '', ''),
  PHD: t('stack', '', ''),
  PHK: t('stack', '', ''),
  PLB: t('stack', '', 'nz'),
  PLD: t('stack', '', 'nz'),
  REP: t('flag', '', '', { disturbs: 'AXYcnzv' }),
  RTL: t('return', '', '', { terminator: true }),
  SEP: t('flag', '', '', { disturbs: 'AXYcnzv' }),
  TCD: t('transfer', 'A', 'nz'),
  TCS: t('transfer', 'A', ''),
  TDC: t('transfer', '', 'Anz'),
  TSC: t('transfer', '', 'Anz'),
  TXY: t('transfer', 'X', 'Ynz', { transfer: { from: 'X', to: 'Y' } }),
  TYX: t('transfer', 'Y', 'Xnz', { transfer: { from: 'Y', to: 'X' } }),
  WDM: t('other', '', ''),
  XBA: t('alu', 'A', 'Anz'),
  XCE: t('flag', 'c', 'c', { disturbs: 'AXY' }),

  // 45GS02
  LDZ: t('load', '', 'Znz'),
  TAZ: t('transfer', 'A', 'Znz', { transfer: { from: 'A', to: 'Z' } }),
  TZA: t('transfer', 'Z', 'Anz', { transfer: { from: 'Z', to: 'A' } }),
  PHZ: t('stack', 'Z', ''),
  PLZ: t('stack', '', 'Znz'),
  INZ: t('alu', 'Z', 'Znz'),
  DEZ: t('alu', 'Z', 'Znz'),
  CPZ: t('compare', 'Z', 'nzc'),
  NEG: t('alu', 'A', 'Anz', { disturbs: 'c' }),
  ASR: t('shift', '', 'nzc'),
  ASW: t('shift', '', 'nzc'),
  ROW: t('shift', 'c', 'nzc'),
  DEW: t('alu', '', 'nz'),
  INW: t('alu', '', 'nz'),
  PHW: t('stack', '', ''),
  TAB: t('transfer', 'A', ''),
  TBA: t('transfer', '', 'Anz'),
  TSY: t('transfer', '', 'Ynz'),
  TYS: t('transfer', 'Y', ''),
  MAP: t('other', 'AXYZ', ''),
  EOM: t('other', '', ''),
  BSR: t('call', '', ''),
  CLE: t('flag', '', ''),
  SEE: t('flag', '', ''),
};

const ACCUMULATOR_FORMS: ReadonlySet<Mnemonic> = new Set([
  'ASL', 'LSR', 'ROL', 'ROR', 'ASR', 'INC', 'DEC', 'NEG',
]);

function indexReads(op: Operand): Resource[] {
  switch (op.mode) {
    case 'indexed-x':
    case 'indexed-indirect-x':
      return ['reg:X'];
    case 'indexed-y':
    case 'indirect-indexed-y':
      return ['reg:Y'];
    case 'indirect-indexed-z':
      return ['reg:Z'];
    case 'long-indirect':
      if (op.index === undefined) return [];
      return op.index === 'Y' ? ['reg:Y'] : ['reg:Z'];
    default:
      return [];
  }
}

/**
 * Effect of `mnemonic` with `operand` on the given CPU.
 *
 * Shifts and increments read and write A only in accumulator form; `BIT #imm` only affects Z;
 * `STZ` stores the Z register on the 45GS02 and zero elsewhere.
 */
export function effectOf(mnemonic: Mnemonic, operand: Operand, features: CpuFeatures): InstructionEffect {
  const tpl = TABLE[mnemonic];
  const reads = resources(tpl.reads);
  const writes = resources(tpl.writes);

  const accumulatorForm =
    ACCUMULATOR_FORMS.has(mnemonic) && (operand.mode === 'accumulator' || operand.mode === 'none');
  if (accumulatorForm) {
    if (!reads.includes('reg:A')) reads.push('reg:A');
    if (!writes.includes('reg:A')) writes.push('reg:A');
  }
  if (mnemonic === 'BIT' && operand.mode === 'immediate') {
    writes.splice(0, writes.length, 'flag:Z');
  }
  if (mnemonic === 'STZ' && features.is45gs02) {
    reads.push('reg:Z');
  }
  for (const r of indexReads(operand)) {
    if (!reads.includes(r)) reads.push(r);
  }

  const kind = tpl.kind;
  const effect: InstructionEffect = {
    kind,
    reads,
    writes,
    disturbs: resources(tpl.disturbs ?? ''),
    flagResults: tpl.flagResults ?? {},
    controlTransfer:
      kind === 'branch' || kind === 'jump' || kind === 'call' || kind === 'return' || tpl.terminator === true,
    terminator: tpl.terminator === true,
  };
  if (tpl.transfer) effect.transfer = tpl.transfer;
  return effect;
}

/**
 * `JSR`, `JSL` and `BSR`.
 */
export function isCall(mnemonic: Mnemonic | undefined): boolean {
  return mnemonic === 'JSR' || mnemonic === 'JSL' || mnemonic === 'BSR';
}

/**
 * Subroutine-terminating returns (`RTS`, `RTL`).
 */
export function isReturn(mnemonic: Mnemonic | undefined): boolean {
  return mnemonic === 'RTS' || mnemonic === 'RTL';
}

/**
 * Unconditional terminators recognized by dead-code elimination (`JMP`, `RTS`, `RTI`).
 */
export function endsStraightLine(mnemonic: Mnemonic | undefined): boolean {
  return mnemonic === 'JMP' || mnemonic === 'RTS' || mnemonic === 'RTI';
}

/**
 * Whether `STZ` can encode this operand (zero page / absolute, optionally `,X`).
 *
 * `STZ` has no long form: 24-bit addresses and ca65 `f:` operands stay `STA`.
 */
export function stzAddressable(operand: Operand): boolean {
  if (operand.mode !== 'direct' && operand.mode !== 'indexed-x') return false;
  if (operand.value !== undefined && operand.value > 0xffff) return false;
  return !/^f:/i.test(operand.expr);
}
