/**
 * Instruction-stream contracts.
 *
 * This module defines types only; ingestion lives in `parser.ts`.
 */
import type { Mnemonic } from '../cpu/mnemonics.js';
import type { Operand } from '../cpu/operand.js';
import type { LineEnding } from '../pipeline.js';
import type { AsmDialect } from './dialects.js';

/**
 * One source line. Records are never physically removed; `isDead` marks deletion.
 */
export interface AsmRecord {
  /** 1-based source line number (inserted copies keep the line of the record they copy). */
  line: number;
  /** Original source line, without the line terminator. */
  text: string;
  label?: string;
  /** Opcode text as written (case preserved). */
  opcode?: string;
  /** Recognized instruction; absent for directives, macros and unknown opcodes. */
  mnemonic?: Mnemonic;
  /** Operand text as written, trailing whitespace trimmed. */
  operand?: string;
  operandInfo: Operand;
  /** Comment text including its marker. */
  comment?: string;
  isDead: boolean;
  /** Captured from the `#NOOPT` / `#OPT` latch when the record was ingested. */
  noOptimize: boolean;
  isLocalLabel: boolean;
  /** Recomputed by every analysis; branch targets are never killed or moved. */
  isBranchTarget: boolean;
  /** Pass that killed the record. */
  removedBy?: string;
  /** Pass that last rewrote the record's mnemonic or operand. */
  rewrittenBy?: string;
  /** Subroutine label the record was copied from by the inliner. */
  inlinedFrom?: string;
}

/**
 * An ingested program: the record stream plus what is needed to print it back.
 */
export interface AsmProgram {
  /** User-facing file path (as provided on input). */
  file: string;
  dialect: AsmDialect;
  records: AsmRecord[];
  /** The input ended with a newline; output preserves it. */
  trailingNewline: boolean;
  lineEnding: LineEnding;
}
