import { isImmediateValue } from '../cpu/operand.js';
import { effectOf, stzAddressable } from '../cpu/effects.js';
import type { OptimizationPass, PassContext } from './pass.js';
import { isMatchable, kill, liveAfter, nextLive, rewrite } from './pass.js';

const NAME = 'cpu65c02';

/**
 * `LDA #0` followed by stores of A becomes `STZ` stores (65C02 family, never the 45GS02, where `STZ`
 * stores the Z register).
 *
 * The scan converts each `STA` that `STZ` can encode and passes over instructions that leave A alone. It
 * stops at anything that reads or writes A, a control transfer, a branch target, a disabled or opaque record.
 * The load itself goes once A and N/Z are no longer read.
 */
export const cpu65c02: OptimizationPass = {
  name: NAME,
  run(ctx: PassContext): number {
    const { records } = ctx.program;
    let count = 0;
    for (let i = 0; i < records.length; i++) {
      const load = records[i];
      if (!isMatchable(load) || load.mnemonic !== 'LDA' || !isImmediateValue(load.operandInfo, 0)) continue;

      let converted = 0;
      for (let j = nextLive(records, i); j >= 0; j = nextLive(records, j)) {
        const r = records[j];
        if (!isMatchable(r) || r.isBranchTarget) break;
        if (r.mnemonic === 'STA' && stzAddressable(r.operandInfo)) {
          rewrite(r, 'STZ', undefined, NAME);
          converted++;
          continue;
        }
        const effect = effectOf(r.mnemonic, r.operandInfo, ctx.features);
        const touchesA =
          effect.reads.includes('reg:A') || effect.writes.includes('reg:A') || effect.disturbs.includes('reg:A');
        if (touchesA || effect.controlTransfer) break;
      }
      count += converted;

      if (converted > 0 && !liveAfter(ctx, i, ['reg:A', 'flag:N', 'flag:Z'])) {
        if (kill(load, NAME)) count++;
      }
    }
    return count;
  },
};
