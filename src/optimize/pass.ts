import type { AsmProgram, AsmRecord } from '../frontend/ast.js';
import type { CpuFeatures, Mnemonic } from '../cpu/mnemonics.js';
import { matchCase } from '../cpu/mnemonics.js';
import { parseOperand } from '../cpu/operand.js';
import type { Resource } from '../cpu/effects.js';
import type { LabelTable } from '../semantics/labels.js';
import { isLiveAfter } from '../semantics/liveness.js';

/**
 * Everything a pass may read. Passes mutate only `program.records` and return their optimization count.
 */
export interface PassContext {
  program: AsmProgram;
  features: CpuFeatures;
  /** Label table from this iteration's analysis. */
  labels: LabelTable;
}

/**
 * A named rewrite over the instruction stream.
 */
export interface OptimizationPass {
  name: string;
  run(ctx: PassContext): number;
}

/**
 * A record some pass may match: live, optimization-enabled, a recognized instruction.
 */
export type MatchableRecord = AsmRecord & { mnemonic: Mnemonic };

export function isMatchable(r: AsmRecord | undefined): r is MatchableRecord {
  return r !== undefined && !r.isDead && !r.noOptimize && r.mnemonic !== undefined;
}

/**
 * Index of the next live record after `index` that is not a blank or comment-only line, or -1.
 */
export function nextLive(records: readonly AsmRecord[], index: number): number {
  for (let i = index + 1; i < records.length; i++) {
    const r = records[i];
    if (!r || r.isDead) continue;
    if (r.opcode === undefined && r.label === undefined) continue;
    return i;
  }
  return -1;
}

/**
 * Indices of `size` adjacent matchable records starting at `start`.
 *
 * Only the first record of a window may be a branch target. Blank and comment-only lines between
 * records are passed over.
 */
export function matchWindow(records: readonly AsmRecord[], start: number, size: number): number[] | undefined {
  if (!isMatchable(records[start])) return undefined;
  const out = [start];
  let at = start;
  while (out.length < size) {
    at = nextLive(records, at);
    const r = records[at];
    if (at < 0 || !isMatchable(r) || r.isBranchTarget) return undefined;
    out.push(at);
  }
  return out;
}

/**
 * Typed access to a window's records.
 */
export function windowRecords(records: readonly AsmRecord[], indices: readonly number[]): MatchableRecord[] {
  const out: MatchableRecord[] = [];
  for (const i of indices) {
    const r = records[i];
    if (isMatchable(r)) out.push(r);
  }
  return out;
}

/**
 * Mark a record dead. Branch targets are never killed; returns whether the record was removed.
 */
export function kill(record: AsmRecord, pass: string): boolean {
  if (record.isBranchTarget || record.isDead) return false;
  record.isDead = true;
  record.removedBy = pass;
  return true;
}

/**
 * Replace a record's instruction, keeping the letter case of the opcode it replaces.
 *
 * `operand` of `undefined` keeps the current operand; `null` drops it.
 */
export function rewrite(record: AsmRecord, mnemonic: Mnemonic, operand: string | null | undefined, pass: string): void {
  record.opcode = matchCase(mnemonic, record.opcode);
  record.mnemonic = mnemonic;
  if (operand === null) {
    delete record.operand;
  } else if (operand !== undefined) {
    record.operand = operand;
  }
  record.operandInfo = parseOperand(record.operand);
  record.rewrittenBy = pass;
}

/**
 * Liveness of `resources` after `index`, for the context's CPU.
 */
export function liveAfter(ctx: PassContext, index: number, resources: readonly Resource[]): boolean {
  return isLiveAfter(ctx.program.records, index, resources, ctx.features);
}
