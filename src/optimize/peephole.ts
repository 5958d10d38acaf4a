import { sameImmediate } from '../cpu/operand.js';
import type { OptimizationPass, PassContext } from './pass.js';
import { kill, matchWindow, windowRecords } from './pass.js';

const NAME = 'peephole';

/**
 * `LDA #v; STA addr; LDA #v` drops the second load: the store leaves A and the flags alone.
 */
export const peephole: OptimizationPass = {
  name: NAME,
  run(ctx: PassContext): number {
    const { records } = ctx.program;
    let count = 0;
    for (let i = 0; i < records.length; i++) {
      const w = matchWindow(records, i, 3);
      if (!w) continue;
      const [load, store, reload] = windowRecords(records, w);
      if (!load || !store || !reload) continue;
      if (load.mnemonic !== 'LDA' || store.mnemonic !== 'STA' || reload.mnemonic !== 'LDA') continue;
      if (!sameImmediate(load.operandInfo, reload.operandInfo)) continue;
      if (kill(reload, NAME)) count++;
    }
    return count;
  },
};
