import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import type {
  CpuTarget,
  LineEnding,
  OptimizationMode,
  OptimizeFileFn,
  OptimizeResult,
  OptimizeStats,
  OptimizerOptions,
  PipelineDeps,
  TraceLevel,
} from './pipeline.js';

import type { AsmProgram } from './frontend/ast.js';
import type { AsmDialect } from './frontend/dialects.js';
import { defaultDialect, findDialect } from './frontend/dialects.js';
import { parseProgram } from './frontend/parser.js';
import type { CpuFeatures } from './cpu/mnemonics.js';
import { cpuFeatures } from './cpu/mnemonics.js';
import type { Artifact, RunSummary } from './formats/types.js';
import { defaultFormatWriters } from './formats/index.js';
import { validateProgram } from './lint/validate.js';
import type { ScheduleResult } from './optimize/scheduler.js';
import { DEFAULT_MAX_ITERATIONS, runScheduler } from './optimize/scheduler.js';

const CPUS: readonly CpuTarget[] = ['6502', '65c02', '65816', '45gs02'];
const MODES: readonly OptimizationMode[] = ['speed', 'size'];
const LINE_ENDINGS: readonly LineEnding[] = ['\n', '\r\n'];

function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

/**
 * Options with defaults applied and names resolved.
 */
export interface ResolvedOptions {
  cpu: CpuTarget;
  features: CpuFeatures;
  mode: OptimizationMode;
  trace: TraceLevel;
  dialect: AsmDialect;
  emitReport: boolean;
  maxIterations: number;
  inline: boolean;
  /** Unset: follow the input. */
  lineEnding?: LineEnding;
}

function configError(diagnostics: Diagnostic[], file: string, message: string): void {
  diagnostics.push({ id: DiagnosticIds.ConfigError, severity: 'error', message, file });
}

/**
 * Apply defaults and validate option values. Unknown values are reported as `ConfigError` diagnostics.
 */
export function resolveOptions(
  options: OptimizerOptions,
  file: string,
  diagnostics: Diagnostic[],
): ResolvedOptions | undefined {
  const cpu = options.cpu ?? '6502';
  const mode = options.mode ?? 'speed';
  const trace = options.trace ?? 0;
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const dialect = options.dialect === undefined ? defaultDialect() : findDialect(options.dialect);

  if (!CPUS.includes(cpu)) configError(diagnostics, file, `Unknown CPU "${String(cpu)}".`);
  if (!MODES.includes(mode)) configError(diagnostics, file, `Unknown optimization mode "${String(mode)}".`);
  if (!dialect) configError(diagnostics, file, `Unknown assembler dialect "${options.dialect ?? ''}".`);
  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    configError(diagnostics, file, `maxIterations must be a positive integer (got ${maxIterations}).`);
  }
  if (options.lineEnding !== undefined && !LINE_ENDINGS.includes(options.lineEnding)) {
    configError(diagnostics, file, `Unknown line ending ${JSON.stringify(options.lineEnding)}.`);
  }
  if (!dialect || hasErrors(diagnostics)) return undefined;

  return {
    cpu,
    features: cpuFeatures(cpu),
    mode,
    trace,
    dialect,
    emitReport: options.emitReport ?? false,
    maxIterations,
    inline: options.inline ?? true,
    ...(options.lineEnding !== undefined ? { lineEnding: options.lineEnding } : {}),
  };
}

/**
 * Run the optimization core over an ingested program: inliner, fixed-point pass loop, then the validator.
 */
export function optimizeProgram(
  program: AsmProgram,
  resolved: ResolvedOptions,
  diagnostics: Diagnostic[],
): ScheduleResult {
  return runScheduler(program, resolved.features, diagnostics, {
    maxIterations: resolved.maxIterations,
    inline: resolved.inline,
    tracePasses: resolved.trace >= 2,
  });
}

/**
 * Optimize assembly source held in memory.
 *
 * Artifacts are produced via `deps.formats`; nothing is written to disk.
 */
export function optimizeSource(
  file: string,
  text: string,
  options: OptimizerOptions = {},
  deps: PipelineDeps = { formats: defaultFormatWriters },
): OptimizeResult {
  const diagnostics: Diagnostic[] = [];
  const resolved = resolveOptions(options, file, diagnostics);
  if (!resolved) return { diagnostics, artifacts: [] };

  let program: AsmProgram;
  let schedule: ScheduleResult;
  try {
    program = parseProgram(file, text, resolved.dialect, diagnostics);
    schedule = optimizeProgram(program, resolved, diagnostics);
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.InternalError,
      severity: 'error',
      message: `Internal error during optimization: ${String(err)}`,
      file,
    });
    return { diagnostics, artifacts: [] };
  }

  const report = validateProgram(program, resolved.features, diagnostics, { snapshots: resolved.trace >= 2 });
  const summary: RunSummary = {
    cpu: resolved.cpu,
    mode: resolved.mode,
    assembler: resolved.dialect.name,
    optimizations: schedule.optimizations,
    iterations: schedule.iterations,
  };

  const lineEnding = resolved.lineEnding ?? program.lineEnding;
  const artifacts: Artifact[] = [deps.formats.writeAsm(program, { trace: resolved.trace, summary, lineEnding })];
  if (resolved.emitReport) {
    if (deps.formats.writeReport) {
      artifacts.push(deps.formats.writeReport(report, summary, { snapshots: resolved.trace >= 2, lineEnding }));
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitReport=true but no report writer is configured; skipping report artifact.',
        file,
      });
    }
  }

  const stats: OptimizeStats = {
    lines: program.records.filter((r) => r.inlinedFrom === undefined).length,
    removed: program.records.filter((r) => r.isDead).length,
    optimizations: schedule.optimizations,
    iterations: schedule.iterations,
    converged: schedule.converged,
  };
  return { diagnostics, artifacts, stats };
}

/**
 * Optimize an assembly file read from disk.
 */
export const optimizeFile: OptimizeFileFn = async (
  entryFile: string,
  options: OptimizerOptions,
  deps: PipelineDeps,
): Promise<OptimizeResult> => {
  const entryPath = resolve(entryFile);
  let text: string;
  try {
    text = await readFile(entryPath, 'utf8');
  } catch (err) {
    return {
      diagnostics: [
        {
          id: DiagnosticIds.IoReadFailed,
          severity: 'error',
          message: `Failed to read input file: ${String(err)}`,
          file: entryPath,
        },
      ],
      artifacts: [],
    };
  }
  return optimizeSource(entryPath, text, options, deps);
};
