import type { AsmProgram, AsmRecord } from './ast.js';
import type { AsmDialect } from './dialects.js';
import { commentMarkerLength, isLocalLabel } from './dialects.js';
import { makeSourceFile } from './source.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { lookupMnemonic } from '../cpu/mnemonics.js';
import { parseOperand } from '../cpu/operand.js';

/**
 * Fields of one source line, before any classification.
 */
export interface LineFields {
  label?: string;
  opcode?: string;
  operand?: string;
  comment?: string;
}

function info(diagnostics: Diagnostic[], file: string, message: string, line: number): void {
  diagnostics.push({
    id: DiagnosticIds.DirectiveToggle,
    severity: 'info',
    message,
    file,
    line,
    column: 1,
  });
}

/**
 * Index of the first comment marker outside a quoted string, or -1.
 */
function findComment(text: string, dialect: AsmDialect): number {
  let quote: string | undefined;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote !== undefined) {
      if (ch === quote) quote = undefined;
      continue;
    }
    if (ch === '"') {
      quote = ch;
      continue;
    }
    // `'c'` character literals; a lone apostrophe (`#'a` in some assemblers) does not open a string.
    if (ch === "'" && text.indexOf("'", i + 1) >= 0) {
      quote = ch;
      continue;
    }
    if (commentMarkerLength(text, i, dialect) > 0) return i;
  }
  return -1;
}

const LABEL_START = /[A-Za-z0-9_@.!:]/;

/**
 * Split one source line into label, opcode, operand and comment.
 *
 * A line whose first character is not blank carries a label, unless that first word is itself an instruction
 * mnemonic with no colon (`lda #1` written at column 1) or does not start like a symbol (`*=$0801`).
 */
export function tokenizeLine(text: string, dialect: AsmDialect): LineFields {
  const out: LineFields = {};
  const commentAt = findComment(text, dialect);
  let code = text;
  if (commentAt >= 0) {
    out.comment = text.slice(commentAt).trimEnd();
    code = text.slice(0, commentAt);
  }
  code = code.trimEnd();
  if (code.trim().length === 0) return out;

  let rest = code;
  const first = code[0] ?? ' ';
  if (!/\s/.test(first) && LABEL_START.test(first)) {
    let end = 1;
    while (end < code.length) {
      const ch = code[end] ?? '';
      if (/\s/.test(ch)) break;
      if (ch === ':' && dialect.supportsColonLabels) break;
      end++;
    }
    const word = code.slice(0, end);
    const hasColon = dialect.supportsColonLabels && code[end] === ':';
    if (hasColon || lookupMnemonic(word) === undefined) {
      out.label = word;
      rest = code.slice(hasColon ? end + 1 : end);
    }
  }

  rest = rest.trim();
  if (rest.length === 0) return out;
  const ws = /\s/.exec(rest);
  if (!ws) {
    out.opcode = rest;
    return out;
  }
  out.opcode = rest.slice(0, ws.index);
  const operand = rest.slice(ws.index).trim();
  if (operand.length > 0) out.operand = operand;
  return out;
}

type Directive = 'noopt' | 'opt';

function directiveOf(comment: string | undefined, dialect: AsmDialect): Directive | undefined {
  if (comment === undefined) return undefined;
  const marker = commentMarkerLength(comment, 0, dialect);
  const body = comment.slice(marker).trimStart().toUpperCase();
  if (body.startsWith('#NOOPT')) return 'noopt';
  if (body.startsWith('#OPT')) return 'opt';
  return undefined;
}

/**
 * Build one record from source text. The record starts live, unlabelled-as-target and enabled.
 */
export function makeRecord(line: number, text: string, dialect: AsmDialect, noOptimize = false): AsmRecord {
  const fields = tokenizeLine(text, dialect);
  const mnemonic = lookupMnemonic(fields.opcode);
  return {
    line,
    text,
    ...(fields.label !== undefined ? { label: fields.label } : {}),
    ...(fields.opcode !== undefined ? { opcode: fields.opcode } : {}),
    ...(mnemonic !== undefined ? { mnemonic } : {}),
    ...(fields.operand !== undefined ? { operand: fields.operand } : {}),
    operandInfo: parseOperand(fields.operand),
    ...(fields.comment !== undefined ? { comment: fields.comment } : {}),
    isDead: false,
    noOptimize,
    isLocalLabel: fields.label !== undefined && isLocalLabel(fields.label, dialect),
    isBranchTarget: false,
  };
}

/**
 * Ingest source text into an instruction stream: exactly one record per line, in source order.
 *
 * `#NOOPT` / `#OPT` comments toggle the optimization latch before the record carrying them is captured, so
 * the directive line itself is already inside (or outside) the protected region.
 */
export function parseProgram(
  file: string,
  text: string,
  dialect: AsmDialect,
  diagnostics: Diagnostic[],
): AsmProgram {
  const source = makeSourceFile(file, text);
  const records: AsmRecord[] = [];
  let enabled = true;
  source.lines.forEach((lineText, i) => {
    const line = i + 1;
    const fields = tokenizeLine(lineText, dialect);
    const directive = directiveOf(fields.comment, dialect);
    if (directive === 'noopt') {
      enabled = false;
      info(diagnostics, file, 'Optimization disabled by #NOOPT.', line);
    } else if (directive === 'opt') {
      enabled = true;
      info(diagnostics, file, 'Optimization enabled by #OPT.', line);
    }
    records.push(makeRecord(line, lineText, dialect, !enabled));
  });
  return { file, dialect, records, trailingNewline: source.trailingNewline, lineEnding: source.lineEnding };
}
