import type { AsmProgram, AsmRecord } from '../frontend/ast.js';
import type { AsmArtifact, RunSummary, WriteAsmOptions } from './types.js';

function header(marker: string, summary: RunSummary): string[] {
  return [
    `${marker} Optimized for ${summary.mode}`,
    `${marker} Assembler: ${summary.assembler}`,
    `${marker} Target CPU: ${summary.cpu}`,
    `${marker} Optimizations: ${summary.optimizations} (${summary.iterations} iteration(s))`,
  ];
}

/**
 * Rebuild a record's line from its fields.
 */
export function formatRecord(r: AsmRecord, colonLabels: boolean): string {
  let out = '';
  if (r.label !== undefined) out = colonLabels ? `${r.label}:` : r.label;
  if (r.opcode !== undefined) {
    out += r.label !== undefined ? '\t' : '    ';
    out += r.opcode;
    if (r.operand !== undefined) out += ` ${r.operand}`;
  }
  if (r.comment !== undefined) out += out.length > 0 ? `\t${r.comment}` : r.comment;
  return out;
}

/**
 * Create the optimized `.asm` artifact.
 *
 * Untouched live lines are copied verbatim (trailing whitespace trimmed); rewritten and inlined records are
 * rebuilt. At trace level 0 nothing else is written, so the output re-optimizes to itself.
 */
export function writeAsm(program: AsmProgram, opts?: WriteAsmOptions): AsmArtifact {
  const lineEnding = opts?.lineEnding ?? program.lineEnding;
  const trace = opts?.trace ?? 0;
  const { commentMarker, supportsColonLabels } = program.dialect;

  const lines: string[] = [];
  if (trace >= 1 && opts?.summary) lines.push(...header(commentMarker, opts.summary));

  for (const r of program.records) {
    if (r.isDead) {
      if (trace >= 1) lines.push(`${commentMarker} OPT: removed (${r.removedBy ?? 'unknown'}) ${r.text.trim()}`);
      continue;
    }
    if (r.rewrittenBy === undefined && r.inlinedFrom === undefined) {
      lines.push(r.text.trimEnd());
      continue;
    }
    if (trace >= 2) {
      if (r.inlinedFrom !== undefined) lines.push(`${commentMarker} OPT: inlined from ${r.inlinedFrom}`);
      if (r.rewrittenBy !== undefined) lines.push(`${commentMarker} OPT: ${r.rewrittenBy}`);
    }
    lines.push(formatRecord(r, supportsColonLabels));
  }

  const text = lines.join(lineEnding) + (program.trailingNewline ? lineEnding : '');
  return { kind: 'asm', text };
}
