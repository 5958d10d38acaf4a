import type { LineEnding } from '../pipeline.js';

/**
 * Source file split into lines.
 */
export interface SourceFile {
  path: string;
  text: string;
  /** Lines without terminators; a trailing `\r` is dropped. */
  lines: string[];
  /** The text ended with `\n` (no empty final line is produced for it). */
  trailingNewline: boolean;
  /** Terminator of the first line; `\n` when there is none. */
  lineEnding: LineEnding;
}

/**
 * Build a {@link SourceFile} from a path and UTF-8 source text.
 */
export function makeSourceFile(path: string, text: string): SourceFile {
  const trailingNewline = text.endsWith('\n');
  const body = trailingNewline ? text.slice(0, -1) : text;
  const lines = text.length === 0 ? [] : body.split('\n').map((l) => (l.endsWith('\r') ? l.slice(0, -1) : l));
  const firstBreak = text.indexOf('\n');
  const lineEnding = firstBreak > 0 && text[firstBreak - 1] === '\r' ? '\r\n' : '\n';
  return { path, text, lines, trailingNewline, lineEnding };
}
