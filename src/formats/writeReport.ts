import type { Flag, Register } from '../cpu/effects.js';
import { FLAGS, REGISTERS } from '../cpu/effects.js';
import type { ValidationReport } from '../lint/validate.js';
import type { CpuState } from '../semantics/registers.js';
import type { ReportArtifact, RunSummary, WriteReportOptions } from './types.js';

function toHex(n: number): string {
  const digits = n > 0xff ? 4 : 2;
  return `$${(n & 0xffff).toString(16).toUpperCase().padStart(digits, '0')}`;
}

function registerText(state: CpuState, reg: Register): string {
  const v = state.regs[reg];
  if (!v.known) return `${reg}=?`;
  if (v.value !== undefined) return `${reg}=${toHex(v.value)}`;
  return `${reg}=${v.expr ?? '?'}`;
}

function flagText(state: CpuState, flag: Flag): string {
  const f = state.flags[flag];
  return `${flag}=${f.known ? (f.set ? '1' : '0') : '?'}`;
}

function listOrNone(items: readonly string[]): string {
  return items.length > 0 ? items.join(', ') : 'none';
}

/**
 * Create the register/flag validation report.
 */
export function writeReport(
  report: ValidationReport,
  summary: RunSummary,
  opts?: WriteReportOptions,
): ReportArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const lines: string[] = [];
  lines.push('Register/flag validation report');
  lines.push(`Target CPU: ${summary.cpu}`);
  lines.push(`Mode: ${summary.mode}`);
  lines.push(`Assembler: ${summary.assembler}`);
  lines.push(`Optimizations: ${summary.optimizations} (${summary.iterations} iteration(s))`);
  lines.push(`Instructions: ${report.instructions}`);
  lines.push(`Register writes: ${REGISTERS.map((r) => `${r}=${report.registerWrites[r]}`).join(' ')}`);
  lines.push(`Flag writes: ${FLAGS.map((f) => `${f}=${report.flagWrites[f]}`).join(' ')}`);
  lines.push(`Registers touched: ${listOrNone(report.touchedRegisters)}`);
  lines.push(`Flags touched: ${listOrNone(report.touchedFlags)}`);

  if (opts?.snapshots && report.snapshots.length > 0) {
    lines.push('');
    lines.push('State after each instruction:');
    for (const s of report.snapshots) {
      const regs = REGISTERS.map((r) => registerText(s.state, r)).join(' ');
      const flags = FLAGS.map((f) => flagText(s.state, f)).join(' ');
      lines.push(`${String(s.line).padStart(5, ' ')}  ${s.text.padEnd(24, ' ')}  ${regs}  ${flags}`);
    }
  }

  return { kind: 'report', text: lines.join(lineEnding) + lineEnding };
}
