import type { AsmProgram, AsmRecord } from '../frontend/ast.js';
import { isLocalLabel, labelKey } from '../frontend/dialects.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { isCall, isReturn } from '../cpu/effects.js';
import { operandSymbols } from '../cpu/operand.js';

/**
 * One label definition and what is known about its uses.
 */
export interface LabelEntry {
  /** Label as written. */
  name: string;
  /** Index of the defining record. */
  index: number;
  /** Indices of live records whose operand names the label. */
  references: number[];
  /** Named by a call instruction (`JSR`, `JSL`, `BSR`). */
  isSubroutine: boolean;
  /** Index of the first terminating return of a subroutine body; undefined when not found. */
  bodyEnd?: number;
  isLocal: boolean;
  /** Key of the enclosing global label, for local labels. */
  scope?: string;
}

/**
 * Label table for one analysis of the stream. Rebuilt from scratch every scheduler iteration.
 */
export interface LabelTable {
  entries: LabelEntry[];
  globals: Map<string, LabelEntry>;
  /** Keyed by `scope + '\0' + name`. */
  locals: Map<string, LabelEntry>;
  /** Scope key in effect at each record index ('' before the first global label). */
  scopes: string[];
}

function localKey(scope: string, key: string): string {
  return `${scope}\u0000${key}`;
}

function isLabelled(r: AsmRecord): r is AsmRecord & { label: string } {
  return !r.isDead && r.label !== undefined;
}

/**
 * Collect live label definitions and the scope each record lives in.
 *
 * A duplicated name keeps its first definition.
 */
export function buildLabelTable(program: AsmProgram): LabelTable {
  const { dialect } = program;
  const table: LabelTable = { entries: [], globals: new Map(), locals: new Map(), scopes: [] };
  let scope = '';
  program.records.forEach((r, index) => {
    if (isLabelled(r)) {
      const key = labelKey(r.label, dialect);
      const local = isLocalLabel(r.label, dialect);
      if (!local) scope = key;
      const entry: LabelEntry = {
        name: r.label,
        index,
        references: [],
        isSubroutine: false,
        isLocal: local,
        ...(local ? { scope } : {}),
      };
      const map = local ? table.locals : table.globals;
      const mapKey = local ? localKey(scope, key) : key;
      if (!map.has(mapKey)) {
        map.set(mapKey, entry);
        table.entries.push(entry);
      }
    }
    table.scopes.push(scope);
  });
  return table;
}

/**
 * Find the label a symbol names when seen from record `fromIndex`.
 */
export function lookupLabel(
  program: AsmProgram,
  table: LabelTable,
  name: string,
  fromIndex: number,
): LabelEntry | undefined {
  const key = labelKey(name, program.dialect);
  if (isLocalLabel(name, program.dialect)) {
    return table.locals.get(localKey(table.scopes[fromIndex] ?? '', key));
  }
  return table.globals.get(key);
}

/**
 * Record which live records reference which labels, and flag call targets as subroutines.
 *
 * An operand references a label when one of its symbol tokens, or the whole expression, names it.
 */
export function resolveReferences(program: AsmProgram, table: LabelTable): void {
  program.records.forEach((r, index) => {
    if (r.isDead || r.operand === undefined) return;
    const expr = r.operandInfo.expr.trim();
    const candidates = new Set(operandSymbols(expr));
    if (expr.length > 0) candidates.add(expr);
    const seen = new Set<LabelEntry>();
    for (const name of candidates) {
      const entry = lookupLabel(program, table, name, index);
      if (!entry || seen.has(entry)) continue;
      seen.add(entry);
      entry.references.push(index);
      if (isCall(r.mnemonic)) entry.isSubroutine = true;
    }
  });
}

/**
 * Locate the first terminating return (`RTS`/`RTL`) of each subroutine, skipping dead records.
 *
 * The scan gives up at the next global label. Failures are reported as info diagnostics when
 * `diagnostics` is given.
 */
export function detectSubroutineBounds(
  program: AsmProgram,
  table: LabelTable,
  diagnostics?: Diagnostic[],
): void {
  const { records } = program;
  for (const entry of table.entries) {
    if (!entry.isSubroutine) continue;
    delete entry.bodyEnd;
    for (let i = entry.index; i < records.length; i++) {
      const r = records[i];
      if (!r || r.isDead) continue;
      if (i > entry.index && r.label !== undefined && !isLocalLabel(r.label, program.dialect)) break;
      if (isReturn(r.mnemonic)) {
        entry.bodyEnd = i;
        break;
      }
    }
    if (entry.bodyEnd === undefined && diagnostics) {
      const line = records[entry.index]?.line;
      diagnostics.push({
        id: DiagnosticIds.SubroutineUnbounded,
        severity: 'info',
        message: `Subroutine "${entry.name}" has no return before the next global label; it is left as is.`,
        file: program.file,
        ...(line !== undefined ? { line } : {}),
      });
    }
  }
}

/**
 * Flag every live labelled record as a branch target and clear the flag everywhere else.
 */
export function markBranchTargets(program: AsmProgram): void {
  for (const r of program.records) {
    r.isBranchTarget = isLabelled(r);
  }
}

/**
 * Resolve a jump operand (the whole expression) to its label entry, honouring local scope.
 */
export function resolveTarget(
  program: AsmProgram,
  table: LabelTable,
  expr: string,
  fromIndex: number,
): LabelEntry | undefined {
  const name = expr.trim();
  if (name.length === 0) return undefined;
  return lookupLabel(program, table, name, fromIndex);
}

/**
 * Full analysis: label table, references, subroutine bounds and branch targets.
 */
export function analyze(program: AsmProgram, diagnostics?: Diagnostic[]): LabelTable {
  const table = buildLabelTable(program);
  resolveReferences(program, table);
  detectSubroutineBounds(program, table, diagnostics);
  markBranchTargets(program);
  return table;
}
