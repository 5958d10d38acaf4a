import type { Operand } from '../cpu/operand.js';
import { sameImmediate } from '../cpu/operand.js';
import { effectOf } from '../cpu/effects.js';
import type { OptimizationPass, PassContext } from './pass.js';
import { kill, liveAfter } from './pass.js';

const NAME = 'constantPropagation';

/**
 * Removes `LDA #v` when A is already known to hold `v`.
 *
 * One remembered immediate for A, forgotten at anything that writes A, at branch targets and at
 * optimization-disabled records. Dead records are passed over as if already gone, so re-optimizing the
 * output finds nothing new. The repeated load also re-derives N/Z from A, so it only goes when N/Z
 * still reflect A or are not read before being overwritten.
 */
export const constantPropagation: OptimizationPass = {
  name: NAME,
  run(ctx: PassContext): number {
    const { records } = ctx.program;
    let known: Operand | undefined;
    let flagsFromA = false;
    let count = 0;
    const forget = (): void => {
      known = undefined;
      flagsFromA = false;
    };

    records.forEach((r, i) => {
      if (r.isDead) return;
      if (r.noOptimize) {
        forget();
        return;
      }
      if (r.isBranchTarget) forget();
      if (r.opcode === undefined) return;
      if (r.mnemonic === undefined) {
        forget();
        return;
      }

      const op = r.operandInfo;
      if (r.mnemonic === 'LDA' && op.mode === 'immediate') {
        if (known && sameImmediate(known, op) && (flagsFromA || !liveAfter(ctx, i, ['flag:N', 'flag:Z']))) {
          if (kill(r, NAME)) {
            count++;
            return;
          }
        }
        known = op;
        flagsFromA = true;
        return;
      }

      const effect = effectOf(r.mnemonic, op, ctx.features);
      if (effect.kind === 'call' || effect.writes.includes('reg:A') || effect.disturbs.includes('reg:A')) {
        forget();
        return;
      }
      // Transfers out of A set N/Z from A's value.
      if (effect.transfer?.from === 'A') return;
      if (effect.writes.includes('flag:N') || effect.writes.includes('flag:Z')) flagsFromA = false;
      if (effect.disturbs.includes('flag:N') || effect.disturbs.includes('flag:Z')) flagsFromA = false;
    });
    return count;
  },
};
