import type { AsmProgram } from '../frontend/ast.js';
import type { CpuFeatures } from '../cpu/mnemonics.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { analyze } from '../semantics/labels.js';
import { constantPropagation } from './constants.js';
import { cpu45gs02 } from './cpu45gs02.js';
import { cpu65c02 } from './cpu65c02.js';
import { deadCode } from './deadCode.js';
import { inlineSubroutines } from './inline.js';
import { jumps } from './jumps.js';
import { loadStore } from './loadStore.js';
import type { OptimizationPass } from './pass.js';
import { peephole } from './peephole.js';
import { registerUsage } from './registerUsage.js';

export const DEFAULT_MAX_ITERATIONS = 10;

export interface ScheduleOptions {
  maxIterations?: number;
  /** Run the inliner before the loop. Defaults to `true`. */
  inline?: boolean;
  /** Report per-pass counts as info diagnostics. */
  tracePasses?: boolean;
}

export interface ScheduleResult {
  iterations: number;
  /** All optimizations, inlining events included. */
  optimizations: number;
  inlined: number;
  converged: boolean;
  perPass: Record<string, number>;
}

/**
 * The CPU-specific slot of the pass sequence.
 *
 * The 45GS02 gets its own pass and never the 65C02 one: there `STZ` stores the Z register, not zero.
 */
export function cpuSpecificPass(features: CpuFeatures): OptimizationPass | undefined {
  if (features.is45gs02) return cpu45gs02;
  if (features.allow65c02) return cpu65c02;
  return undefined;
}

/**
 * Passes of one iteration in order. Dead-code elimination is always last.
 */
export function passSequence(features: CpuFeatures): OptimizationPass[] {
  const cpu = cpuSpecificPass(features);
  return [peephole, loadStore, registerUsage, constantPropagation, ...(cpu ? [cpu] : []), jumps, deadCode];
}

/**
 * Inline, then re-analyze and run the pass sequence until an iteration changes nothing or the iteration cap
 * is reached. A converged stream gets one more inlining attempt: removals may have left a subroutine with a
 * single call or with no fall-through entry. When that inlines anything the loop resumes, so re-optimizing
 * the output finds nothing new.
 *
 * Hitting the cap while the last iteration still made progress is reported as a warning; the stream is
 * left in its last (valid) state.
 */
export function runScheduler(
  program: AsmProgram,
  features: CpuFeatures,
  diagnostics: Diagnostic[],
  opts: ScheduleOptions = {},
): ScheduleResult {
  const maxIterations = Math.max(1, opts.maxIterations ?? DEFAULT_MAX_ITERATIONS);
  const inlining = opts.inline !== false;
  const sequence = passSequence(features);
  const perPass: Record<string, number> = {};
  for (const p of sequence) perPass[p.name] = 0;

  // The first analysis reports subroutines it cannot bound; later ones stay quiet.
  analyze(program, diagnostics);
  let inlined = inlining ? inlineSubroutines(program, features, diagnostics) : 0;

  let optimizations = inlined;
  let iterations = 0;
  let lastCount = 0;
  for (;;) {
    while (iterations < maxIterations) {
      iterations++;
      lastCount = 0;
      const labels = analyze(program);
      const ctx = { program, features, labels };
      for (const pass of sequence) {
        const n = pass.run(ctx);
        perPass[pass.name] = (perPass[pass.name] ?? 0) + n;
        lastCount += n;
        if (opts.tracePasses && n > 0) {
          diagnostics.push({
            id: DiagnosticIds.PassTrace,
            severity: 'info',
            message: `Iteration ${iterations}: ${pass.name} applied ${n} optimization(s).`,
            file: program.file,
          });
        }
      }
      optimizations += lastCount;
      if (lastCount === 0) break;
    }
    if (lastCount !== 0 || !inlining) break;

    const late = inlineSubroutines(program, features, diagnostics);
    if (late === 0) break;
    inlined += late;
    optimizations += late;
    if (iterations >= maxIterations) {
      lastCount = late;
      break;
    }
  }
  if (inlining) perPass['inline'] = inlined;

  const converged = lastCount === 0;
  if (!converged) {
    diagnostics.push({
      id: DiagnosticIds.NonConvergence,
      severity: 'warning',
      message: `Optimization did not reach a fixed point within ${maxIterations} iteration(s); output reflects the last iteration.`,
      file: program.file,
    });
  }
  // Leave branch-target flags matching the final stream.
  analyze(program);
  return { iterations, optimizations, inlined, converged, perPass };
}
