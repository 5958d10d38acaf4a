import type { Operand } from '../cpu/operand.js';
import { sameOperand } from '../cpu/operand.js';
import type { OptimizationPass, PassContext } from './pass.js';
import { kill, matchWindow, windowRecords } from './pass.js';

const NAME = 'loadStore';

/**
 * Whether a store of A can change what a reload of `load` reads, other than by writing A itself.
 *
 * A direct or indexed reload reads either the untouched byte or the one just stored, both equal to A. Loads
 * through a pointer are at risk when the store may overwrite a pointer byte; `($zp,X)` and stack-relative
 * pointers are never proven apart.
 */
function storeMovesLoad(load: Operand, store: Operand): boolean {
  switch (load.mode) {
    case 'direct':
    case 'indexed-x':
    case 'indexed-y':
      return false;
    case 'indirect':
    case 'indirect-indexed-y':
    case 'indirect-indexed-z':
    case 'long-indirect': {
      if (store.mode !== 'direct' || load.value === undefined || store.value === undefined) return true;
      const width = load.mode === 'long-indirect' ? 3 : 2;
      return store.value >= load.value && store.value < load.value + width;
    }
    default:
      return true;
  }
}

/**
 * `LDA m; STA addr; LDA m` drops the reload: `STA` leaves A holding the value of `m`.
 *
 * Memory-mapped registers that change on read are not modelled.
 */
export const loadStore: OptimizationPass = {
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
      const src = load.operandInfo;
      if (src.mode === 'immediate' || src.mode === 'none') continue;
      if (!sameOperand(src, reload.operandInfo)) continue;
      if (storeMovesLoad(src, store.operandInfo)) continue;
      if (kill(reload, NAME)) count++;
    }
    return count;
  },
};
