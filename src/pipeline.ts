import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters } from './formats/types.js';

export type CpuTarget = '6502' | '65c02' | '65816' | '45gs02';
export type OptimizationMode = 'speed' | 'size';
export type TraceLevel = 0 | 1 | 2;
export type LineEnding = '\n' | '\r\n';

/**
 * Options that influence optimization behavior and which artifacts are produced.
 */
export interface OptimizerOptions {
  /** Target CPU. Defaults to `6502`. */
  cpu?: CpuTarget;
  /** Optimization mode. Defaults to `speed`. */
  mode?: OptimizationMode;
  /**
   * Trace verbosity.
   *
   * - `0`: plain output, no generated text.
   * - `1`: output header plus one comment line per removed record.
   * - `2`: additionally annotates rewritten records, reports pass notes and per-instruction state snapshots.
   */
  trace?: TraceLevel;
  /** Assembler syntax dialect name (see `frontend/dialects.ts`). Defaults to `generic`. */
  dialect?: string;
  /** Emit the register/flag validation report (`.report.txt`). */
  emitReport?: boolean;
  /** Scheduler iteration cap. Defaults to 10. */
  maxIterations?: number;
  /** Run the single-use subroutine inliner before the pass loop. Defaults to `true`. */
  inline?: boolean;
  /** Line ending of the written artifacts. Defaults to the one the input uses. */
  lineEnding?: LineEnding;
}

/**
 * Result of an optimization run: diagnostics plus any produced artifacts and run statistics.
 */
export interface OptimizeResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
  stats?: OptimizeStats;
}

/**
 * Counters describing what a run did.
 */
export interface OptimizeStats {
  /** Source lines ingested (one record per line). */
  lines: number;
  /** Records removed by the optimizer. */
  removed: number;
  /** Total optimizations applied, inlining included. */
  optimizations: number;
  /** Scheduler iterations executed. */
  iterations: number;
  /** False when the scheduler stopped at its iteration cap while still making progress. */
  converged: boolean;
}

/**
 * Dependency injection surface for the optimizer pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can stay pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level file optimization function signature used by the pipeline contract.
 */
export type OptimizeFileFn = (
  entryFile: string,
  options: OptimizerOptions,
  deps: PipelineDeps,
) => Promise<OptimizeResult>;
