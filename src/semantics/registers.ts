import type { AsmRecord } from '../frontend/ast.js';
import type { CpuFeatures } from '../cpu/mnemonics.js';
import type { Flag, Register, Resource } from '../cpu/effects.js';
import { FLAGS, REGISTERS, effectOf } from '../cpu/effects.js';

/**
 * Abstract value of one register.
 */
export interface RegisterValue {
  known: boolean;
  /** Known to hold zero. */
  zero: boolean;
  /** Numeric value, when the register was loaded from a numeric literal. */
  value?: number;
  /** Immediate expression the register was loaded from (numeric or symbolic). */
  expr?: string;
  /** Written by the last step. */
  modified: boolean;
}

export interface FlagValue {
  known: boolean;
  set: boolean;
}

/**
 * Abstract register/flag state. Register Z is the 45GS02 Z register; flag Z is the zero flag.
 */
export interface CpuState {
  regs: Record<Register, RegisterValue>;
  flags: Record<Flag, FlagValue>;
}

const UNKNOWN_REG: RegisterValue = { known: false, zero: false, modified: false };
const UNKNOWN_FLAG: FlagValue = { known: false, set: false };

/**
 * All registers and flags unknown.
 */
export function unknownState(): CpuState {
  return {
    regs: { A: { ...UNKNOWN_REG }, X: { ...UNKNOWN_REG }, Y: { ...UNKNOWN_REG }, Z: { ...UNKNOWN_REG } },
    flags: {
      C: { ...UNKNOWN_FLAG },
      N: { ...UNKNOWN_FLAG },
      Z: { ...UNKNOWN_FLAG },
      V: { ...UNKNOWN_FLAG },
    },
  };
}

function copyState(s: CpuState): CpuState {
  return {
    regs: {
      A: { ...s.regs.A, modified: false },
      X: { ...s.regs.X, modified: false },
      Y: { ...s.regs.Y, modified: false },
      Z: { ...s.regs.Z, modified: false },
    },
    flags: { C: { ...s.flags.C }, N: { ...s.flags.N }, Z: { ...s.flags.Z }, V: { ...s.flags.V } },
  };
}

function forgetAll(s: CpuState, markModified: boolean): void {
  for (const r of REGISTERS) s.regs[r] = { ...UNKNOWN_REG, modified: markModified };
  for (const f of FLAGS) s.flags[f] = { ...UNKNOWN_FLAG };
}

function setNZ(s: CpuState, value: number | undefined): void {
  if (value === undefined) {
    s.flags.N = { ...UNKNOWN_FLAG };
    s.flags.Z = { ...UNKNOWN_FLAG };
    return;
  }
  const sign = value > 0xff ? 0x8000 : 0x80;
  s.flags.N = { known: true, set: (value & sign) !== 0 };
  s.flags.Z = { known: true, set: value === 0 };
}

const REGISTER_OF: Partial<Record<Resource, Register>> = { 'reg:A': 'A', 'reg:X': 'X', 'reg:Y': 'Y', 'reg:Z': 'Z' };
const FLAG_OF: Partial<Record<Resource, Flag>> = { 'flag:C': 'C', 'flag:N': 'N', 'flag:Z': 'Z', 'flag:V': 'V' };

function apply(s: CpuState, resource: Resource, fixed?: Partial<Record<Flag, boolean>>): void {
  const reg = REGISTER_OF[resource];
  if (reg) {
    s.regs[reg] = { ...UNKNOWN_REG, modified: true };
    return;
  }
  const flag = FLAG_OF[resource];
  if (!flag) return;
  const result = fixed?.[flag];
  s.flags[flag] = result === undefined ? { ...UNKNOWN_FLAG } : { known: true, set: result };
}

/**
 * Advance the abstract state over one record.
 *
 * Reaching a branch target forgets everything first, since other paths may enter there. Opaque records
 * (directives, macros, unknown opcodes) invalidate all registers and flags; blank and dead records leave the
 * state unchanged.
 */
export function step(record: AsmRecord, state: CpuState, features: CpuFeatures): CpuState {
  const next = copyState(state);
  if (record.isDead) return next;
  if (record.isBranchTarget) forgetAll(next, false);
  if (record.opcode === undefined) return next;
  const m = record.mnemonic;
  if (m === undefined) {
    forgetAll(next, true);
    return next;
  }

  const op = record.operandInfo;
  const effect = effectOf(m, op, features);

  if (effect.kind === 'call') {
    forgetAll(next, true);
    return next;
  }

  if (effect.kind === 'load' && op.mode === 'immediate') {
    const reg: Register = m === 'LDA' ? 'A' : m === 'LDX' ? 'X' : m === 'LDY' ? 'Y' : 'Z';
    next.regs[reg] = {
      known: true,
      zero: op.value === 0,
      ...(op.value !== undefined ? { value: op.value } : {}),
      expr: op.expr,
      modified: true,
    };
    setNZ(next, op.value);
    return next;
  }

  if (effect.transfer) {
    const src = next.regs[effect.transfer.from];
    next.regs[effect.transfer.to] = { ...src, modified: true };
    setNZ(next, src.known ? src.value : undefined);
    return next;
  }

  for (const r of effect.writes) apply(next, r, effect.flagResults);
  for (const r of effect.disturbs) apply(next, r);
  return next;
}
