import { endsStraightLine } from '../cpu/effects.js';
import type { OptimizationPass, PassContext } from './pass.js';
import { isMatchable, kill } from './pass.js';

const NAME = 'deadCode';

/**
 * Instructions after `JMP`, `RTS` or `RTI` that no label leads to are unreachable.
 *
 * Blank and comment-only lines are kept. The sweep stops at a label, a disabled record, or anything that
 * is not a recognized instruction (data, directives, macros).
 */
export const deadCode: OptimizationPass = {
  name: NAME,
  run(ctx: PassContext): number {
    const { records } = ctx.program;
    let count = 0;
    for (let i = 0; i < records.length; i++) {
      const r = records[i];
      if (!isMatchable(r) || !endsStraightLine(r.mnemonic)) continue;
      for (let j = i + 1; j < records.length; j++) {
        const next = records[j];
        if (!next) break;
        if (next.isDead) continue;
        if (next.opcode === undefined && next.label === undefined) continue;
        if (!isMatchable(next) || next.label !== undefined || next.isBranchTarget) break;
        if (kill(next, NAME)) count++;
      }
    }
    return count;
  },
};
