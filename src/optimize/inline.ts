import type { AsmProgram, AsmRecord } from '../frontend/ast.js';
import type { CpuFeatures, Mnemonic } from '../cpu/mnemonics.js';
import { effectOf, isCall } from '../cpu/effects.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { LabelEntry } from '../semantics/labels.js';
import { analyze } from '../semantics/labels.js';

const NAME = 'inline';

const PUSHES: ReadonlySet<Mnemonic> = new Set([
  'PHA', 'PHP', 'PHX', 'PHY', 'PHZ', 'PHB', 'PHD', 'PHK', 'PEA', 'PEI', 'PER', 'PHW',
]);
const PULLS: ReadonlySet<Mnemonic> = new Set(['PLA', 'PLP', 'PLX', 'PLY', 'PLZ', 'PLB', 'PLD']);

/**
 * The live instruction control falls from into `index`, or `undefined` when a label-only line comes first.
 */
function previousInstruction(records: readonly AsmRecord[], index: number): AsmRecord | undefined {
  for (let i = index - 1; i >= 0; i--) {
    const r = records[i];
    if (!r || r.isDead) continue;
    if (r.opcode !== undefined) return r;
    if (r.label !== undefined) return undefined;
  }
  return undefined;
}

/**
 * Body records `[label, return)` that would be copied, or `undefined` when the body cannot be moved.
 *
 * The body may not contain calls, control transfers, further labels, disabled or opaque records, or stack
 * accesses that could see the return address.
 */
function movableBody(
  records: readonly AsmRecord[],
  entry: LabelEntry,
  features: CpuFeatures,
): AsmRecord[] | undefined {
  const end = entry.bodyEnd;
  if (end === undefined) return undefined;
  const ret = records[end];
  if (!ret || ret.mnemonic !== 'RTS' || ret.noOptimize) return undefined;
  if (end !== entry.index && ret.label !== undefined) return undefined;

  const body: AsmRecord[] = [];
  let depth = 0;
  for (let i = entry.index; i < end; i++) {
    const r = records[i];
    if (!r || r.isDead) continue;
    if (r.noOptimize) return undefined;
    if (i !== entry.index && r.label !== undefined) return undefined;
    if (r.opcode === undefined) continue;
    const m = r.mnemonic;
    if (m === undefined || isCall(m) || m === 'TSX' || m === 'TXS' || m === 'TSY' || m === 'TYS') return undefined;
    if (effectOf(m, r.operandInfo, features).controlTransfer) return undefined;
    if (PUSHES.has(m)) depth++;
    if (PULLS.has(m)) depth--;
    if (depth < 0) return undefined;
    body.push(r);
  }
  return depth === 0 ? body : undefined;
}

function copyRecord(r: AsmRecord, from: string): AsmRecord {
  const copy: AsmRecord = {
    ...r,
    operandInfo: { ...r.operandInfo },
    isBranchTarget: false,
    isLocalLabel: false,
    inlinedFrom: from,
  };
  delete copy.label;
  delete copy.removedBy;
  return copy;
}

function removeForInline(r: AsmRecord): void {
  r.isDead = true;
  r.isBranchTarget = false;
  r.removedBy = NAME;
}

/**
 * Try to inline one subroutine; returns the rebuilt record array or `undefined` when nothing qualifies.
 */
function inlineOne(
  program: AsmProgram,
  features: CpuFeatures,
  diagnostics: Diagnostic[],
): AsmRecord[] | undefined {
  const { records } = program;
  const table = analyze(program);
  for (const entry of table.entries) {
    if (!entry.isSubroutine || entry.references.length !== 1) continue;
    const callIndex = entry.references[0];
    if (callIndex === undefined) continue;
    const call = records[callIndex];
    const labelRecord = records[entry.index];
    if (!call || !labelRecord) continue;
    if (call.isDead || call.noOptimize || call.mnemonic !== 'JSR' || call.label !== undefined) continue;
    if (call.operandInfo.mode !== 'direct' || labelRecord.noOptimize) continue;
    if (callIndex >= entry.index && callIndex <= (entry.bodyEnd ?? entry.index)) continue;

    // The body must only be reachable through the call.
    const before = previousInstruction(records, entry.index);
    if (!before?.mnemonic || !effectOf(before.mnemonic, before.operandInfo, features).terminator) continue;

    const body = movableBody(records, entry, features);
    const end = entry.bodyEnd;
    if (!body || end === undefined) continue;

    const copies = body.map((r) => copyRecord(r, entry.name));
    removeForInline(call);
    for (let i = entry.index; i <= end; i++) {
      const r = records[i];
      if (r && !r.isDead && (r.opcode !== undefined || r.label !== undefined)) removeForInline(r);
    }
    diagnostics.push({
      id: DiagnosticIds.Inlined,
      severity: 'info',
      message: `Inlined subroutine "${entry.name}" (${copies.length} instruction(s)) at its only call.`,
      file: program.file,
      line: call.line,
    });
    return [...records.slice(0, callIndex + 1), ...copies, ...records.slice(callIndex + 1)];
  }
  return undefined;
}

/**
 * Copy every single-use subroutine body into its call site, one event at a time.
 *
 * The call, label, original body and return are marked dead; copies are inserted directly after the call.
 * Returns the number of inlining events.
 */
export function inlineSubroutines(program: AsmProgram, features: CpuFeatures, diagnostics: Diagnostic[]): number {
  let events = 0;
  for (;;) {
    const rebuilt = inlineOne(program, features, diagnostics);
    if (!rebuilt) return events;
    program.records = rebuilt;
    events++;
  }
}
