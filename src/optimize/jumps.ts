import { resolveTarget } from '../semantics/labels.js';
import type { OptimizationPass, PassContext } from './pass.js';
import { isMatchable, kill, nextLive } from './pass.js';

const NAME = 'jumps';

/**
 * A `JMP label` whose label sits on the next live record, or on one of the label-only records directly
 * following, falls through anyway.
 */
export const jumps: OptimizationPass = {
  name: NAME,
  run(ctx: PassContext): number {
    const { program, labels } = ctx;
    const { records } = program;
    let count = 0;
    records.forEach((r, i) => {
      if (!isMatchable(r) || r.mnemonic !== 'JMP' || r.isBranchTarget) return;
      if (r.operandInfo.mode !== 'direct') return;
      const target = resolveTarget(program, labels, r.operandInfo.expr, i);
      if (!target) return;
      for (let j = nextLive(records, i); j >= 0; j = nextLive(records, j)) {
        const next = records[j];
        if (!next || next.label === undefined) return;
        if (j === target.index) {
          if (kill(r, NAME)) count++;
          return;
        }
        if (next.opcode !== undefined) return;
      }
    });
    return count;
  },
};
