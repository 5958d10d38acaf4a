import type { CpuTarget } from '../pipeline.js';

const NMOS_6502 = [
  'ADC', 'AND', 'ASL', 'BCC', 'BCS', 'BEQ', 'BIT', 'BMI', 'BNE', 'BPL', 'BRK', 'BVC', 'BVS', 'CLC',
  'CLD', 'CLI', 'CLV', 'CMP', 'CPX', 'CPY', 'DEC', 'DEX', 'DEY', 'EOR', 'INC', 'INX', 'INY', 'JMP',
  'JSR', 'LDA', 'LDX', 'LDY', 'LSR', 'NOP', 'ORA', 'PHA', 'PHP', 'PLA', 'PLP', 'ROL', 'ROR', 'RTI',
  'RTS', 'SBC', 'SEC', 'SED', 'SEI', 'STA', 'STX', 'STY', 'TAX', 'TAY', 'TSX', 'TXA', 'TXS', 'TYA',
] as const;

const CMOS_65C02 = ['BRA', 'PHX', 'PHY', 'PLX', 'PLY', 'STZ', 'TRB', 'TSB', 'WAI', 'STP'] as const;

const WDC_65816 = [
  'BRL', 'COP', 'JML', 'JSL', 'MVN', 'MVP', 'PEA', 'PEI', 'PER', 'PHB', 'PHD', 'PHK', 'PLB', 'PLD',
  'REP', 'RTL', 'SEP', 'TCD', 'TCS', 'TDC', 'TSC', 'TXY', 'TYX', 'WDM', 'XBA', 'XCE',
] as const;

const CSG_45GS02 = [
  'LDZ', 'TAZ', 'TZA', 'PHZ', 'PLZ', 'INZ', 'DEZ', 'CPZ', 'NEG', 'ASR', 'ASW', 'ROW', 'DEW', 'INW',
  'PHW', 'TAB', 'TBA', 'TSY', 'TYS', 'MAP', 'EOM', 'BSR', 'CLE', 'SEE',
] as const;

/**
 * Closed set of recognized instruction mnemonics across the 6502 family.
 */
export type Mnemonic =
  | (typeof NMOS_6502)[number]
  | (typeof CMOS_65C02)[number]
  | (typeof WDC_65816)[number]
  | (typeof CSG_45GS02)[number];

const ALL: readonly Mnemonic[] = [...NMOS_6502, ...CMOS_65C02, ...WDC_65816, ...CSG_45GS02];
const BY_NAME: ReadonlyMap<string, Mnemonic> = new Map(ALL.map((m) => [m, m]));

/**
 * Map raw opcode text to a mnemonic, case-insensitively.
 *
 * Returns `undefined` for directives, macros and anything outside the closed set; callers treat such
 * records as opaque.
 */
export function lookupMnemonic(opcode: string | undefined): Mnemonic | undefined {
  if (opcode === undefined) return undefined;
  return BY_NAME.get(opcode.toUpperCase());
}

/**
 * CPU capabilities resolved once per run.
 */
export interface CpuFeatures {
  cpu: CpuTarget;
  /** 65C02 instructions (`STZ`, `BRA`, ...) are available. */
  allow65c02: boolean;
  is65816: boolean;
  is45gs02: boolean;
}

export function cpuFeatures(cpu: CpuTarget): CpuFeatures {
  return {
    cpu,
    allow65c02: cpu !== '6502',
    is65816: cpu === '65816',
    is45gs02: cpu === '45gs02',
  };
}

/**
 * Rewrite `target` in the letter case of `original` (`lda` → `stz`, `Lda` → `Stz`, `LDA` → `STZ`).
 */
export function matchCase(target: Mnemonic, original: string | undefined): string {
  if (original === undefined || original.length === 0) return target;
  if (original === original.toLowerCase()) return target.toLowerCase();
  if (original === original.toUpperCase()) return target;
  const head = original[0] ?? '';
  return head === head.toUpperCase()
    ? target.charAt(0) + target.slice(1).toLowerCase()
    : target.toLowerCase();
}
