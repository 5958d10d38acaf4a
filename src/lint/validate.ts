import type { AsmProgram } from '../frontend/ast.js';
import type { CpuFeatures } from '../cpu/mnemonics.js';
import type { Flag, Register, Resource } from '../cpu/effects.js';
import { FLAGS, REGISTERS, effectOf } from '../cpu/effects.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { CpuState } from '../semantics/registers.js';
import { step, unknownState } from '../semantics/registers.js';

const FLAG_RESOURCES: Record<Flag, Resource> = { C: 'flag:C', N: 'flag:N', Z: 'flag:Z', V: 'flag:V' };

/**
 * Tracker state after one instruction (trace level 2 only).
 */
export interface StateSnapshot {
  line: number;
  text: string;
  state: CpuState;
}

export interface ValidationReport {
  /** Live instruction records (recognized or not). */
  instructions: number;
  registerWrites: Record<Register, number>;
  flagWrites: Record<Flag, number>;
  /** Registers written at least once, in A/X/Y/Z order. */
  touchedRegisters: Register[];
  /** Flags written at least once, in C/N/Z/V order. */
  touchedFlags: Flag[];
  snapshots: StateSnapshot[];
}

export interface ValidateOptions {
  snapshots?: boolean;
}

/**
 * Read-only sweep of the final stream with the register/flag tracker.
 *
 * Collects usage statistics and emits one summary info diagnostic. Records are never changed.
 */
export function validateProgram(
  program: AsmProgram,
  features: CpuFeatures,
  diagnostics: Diagnostic[],
  opts: ValidateOptions = {},
): ValidationReport {
  const report: ValidationReport = {
    instructions: 0,
    registerWrites: { A: 0, X: 0, Y: 0, Z: 0 },
    flagWrites: { C: 0, N: 0, Z: 0, V: 0 },
    touchedRegisters: [],
    touchedFlags: [],
    snapshots: [],
  };

  let state = unknownState();
  for (const r of program.records) {
    state = step(r, state, features);
    if (r.isDead || r.opcode === undefined) continue;
    report.instructions++;
    for (const reg of REGISTERS) {
      if (state.regs[reg].modified) report.registerWrites[reg]++;
    }
    if (r.mnemonic !== undefined) {
      const effect = effectOf(r.mnemonic, r.operandInfo, features);
      const written = [...effect.writes, ...effect.disturbs];
      for (const f of FLAGS) {
        if (written.includes(FLAG_RESOURCES[f])) report.flagWrites[f]++;
      }
    }
    if (opts.snapshots) report.snapshots.push({ line: r.line, text: r.text.trim(), state });
  }

  report.touchedRegisters = REGISTERS.filter((reg) => report.registerWrites[reg] > 0);
  report.touchedFlags = FLAGS.filter((f) => report.flagWrites[f] > 0);

  const regs = report.touchedRegisters.length > 0 ? report.touchedRegisters.join(', ') : 'none';
  const flags = report.touchedFlags.length > 0 ? report.touchedFlags.join(', ') : 'none';
  diagnostics.push({
    id: DiagnosticIds.ValidationSummary,
    severity: 'info',
    message: `Validated ${report.instructions} instruction(s); registers written: ${regs}; flags written: ${flags}.`,
    file: program.file,
  });
  return report;
}
