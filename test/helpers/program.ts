import type { AsmProgram, AsmRecord } from '../../src/frontend/ast.js';
import type { AsmDialect } from '../../src/frontend/dialects.js';
import { defaultDialect, findDialect } from '../../src/frontend/dialects.js';
import { makeRecord, parseProgram } from '../../src/frontend/parser.js';
import { cpuFeatures } from '../../src/cpu/mnemonics.js';
import type { Diagnostic } from '../../src/diagnostics/types.js';
import type { OptimizationPass, PassContext } from '../../src/optimize/pass.js';
import { analyze } from '../../src/semantics/labels.js';
import type { CpuTarget } from '../../src/pipeline.js';

export function dialectOf(name: string): AsmDialect {
  const d = findDialect(name);
  if (!d) throw new Error(`unknown dialect ${name}`);
  return d;
}

export function program(lines: string[], dialect = 'generic', diagnostics: Diagnostic[] = []): AsmProgram {
  return parseProgram('test.asm', `${lines.join('\n')}\n`, dialectOf(dialect), diagnostics);
}

export function record(text: string, line = 1): AsmRecord {
  return makeRecord(line, text, defaultDialect());
}

export function contextFor(p: AsmProgram, cpu: CpuTarget = '6502'): PassContext {
  return { program: p, features: cpuFeatures(cpu), labels: analyze(p) };
}

/**
 * Run one pass once over `lines`; returns its count and the live instructions left.
 */
export function runPass(
  pass: OptimizationPass,
  lines: string[],
  cpu: CpuTarget = '6502',
): { count: number; code: string[]; program: AsmProgram } {
  const p = program(lines);
  const count = pass.run(contextFor(p, cpu));
  return { count, code: liveCode(p), program: p };
}

/**
 * Live instruction records as `opcode operand`.
 */
export function liveCode(p: AsmProgram): string[] {
  return p.records
    .filter((r) => !r.isDead && r.opcode !== undefined)
    .map((r) => (r.operand !== undefined ? `${r.opcode ?? ''} ${r.operand}` : (r.opcode ?? '')));
}
