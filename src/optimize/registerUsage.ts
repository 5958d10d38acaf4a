import type { Mnemonic } from '../cpu/mnemonics.js';
import type { Resource } from '../cpu/effects.js';
import type { OptimizationPass, PassContext } from './pass.js';
import { kill, liveAfter, matchWindow, windowRecords } from './pass.js';

const NAME = 'registerUsage';

// Round trips through an index register: first, second, register clobbered by the pair.
const ROUND_TRIPS: ReadonlyArray<readonly [Mnemonic, Mnemonic, Resource]> = [
  ['TAX', 'TXA', 'reg:X'],
  ['TAY', 'TYA', 'reg:Y'],
  ['TAZ', 'TZA', 'reg:Z'],
];

/**
 * Adjacent `TAX; TXA` (and the `Y`/`Z` forms) leave A unchanged; both go when the index register and
 * N/Z written by the pair are not read afterwards. The window is exactly two adjacent records.
 */
export const registerUsage: OptimizationPass = {
  name: NAME,
  run(ctx: PassContext): number {
    const { records } = ctx.program;
    let count = 0;
    for (let i = 0; i < records.length; i++) {
      const w = matchWindow(records, i, 2);
      if (!w) continue;
      const [first, second] = windowRecords(records, w);
      const secondIndex = w[1];
      if (!first || !second || secondIndex === undefined || first.isBranchTarget) continue;
      const trip = ROUND_TRIPS.find(([a, b]) => a === first.mnemonic && b === second.mnemonic);
      if (!trip) continue;
      if (liveAfter(ctx, secondIndex, [trip[2], 'flag:N', 'flag:Z'])) continue;
      if (kill(first, NAME) && kill(second, NAME)) count++;
    }
    return count;
  },
};
