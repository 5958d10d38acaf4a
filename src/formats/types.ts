import type { AsmProgram } from '../frontend/ast.js';
import type { ValidationReport } from '../lint/validate.js';
import type { CpuTarget, LineEnding, OptimizationMode, TraceLevel } from '../pipeline.js';

/**
 * Run facts shown in generated headers and reports.
 */
export interface RunSummary {
  cpu: CpuTarget;
  mode: OptimizationMode;
  /** Display name of the assembler dialect. */
  assembler: string;
  optimizations: number;
  iterations: number;
}

/**
 * Options for optimized `.asm` emission.
 */
export interface WriteAsmOptions {
  trace?: TraceLevel;
  /** Required for the header written at trace level 1 and above. */
  summary?: RunSummary;
  /** Defaults to the line ending of the ingested program. */
  lineEnding?: LineEnding;
}

/**
 * Options for validation report writing.
 */
export interface WriteReportOptions {
  /** Include per-instruction state snapshots (trace level 2). */
  snapshots?: boolean;
  lineEnding?: LineEnding;
}

/**
 * In-memory optimized assembly artifact.
 */
export interface AsmArtifact {
  kind: 'asm';
  path?: string;
  text: string;
}

/**
 * In-memory validation report artifact.
 */
export interface ReportArtifact {
  kind: 'report';
  path?: string;
  text: string;
}

/**
 * Union of all artifact kinds produced by the optimizer.
 */
export type Artifact = AsmArtifact | ReportArtifact;

/**
 * Format writers used by the pipeline to turn the optimized stream into artifacts.
 */
export interface FormatWriters {
  writeAsm(program: AsmProgram, opts?: WriteAsmOptions): AsmArtifact;
  writeReport?(report: ValidationReport, summary: RunSummary, opts?: WriteReportOptions): ReportArtifact;
}
