import type { AsmRecord } from '../frontend/ast.js';
import type { CpuFeatures } from '../cpu/mnemonics.js';
import type { Resource } from '../cpu/effects.js';
import { effectOf } from '../cpu/effects.js';

/**
 * Whether any of `resources` may be observed after `records[index]`.
 *
 * Forward scan over live records: a read before a full overwrite makes a resource live. Control transfers,
 * opaque records and optimization-disabled records end the scan with everything still pending live. Labels
 * are passed over. Reaching the end of the stream means dead.
 */
export function isLiveAfter(
  records: readonly AsmRecord[],
  index: number,
  resources: readonly Resource[],
  features: CpuFeatures,
): boolean {
  const pending = new Set(resources);
  for (let i = index + 1; i < records.length && pending.size > 0; i++) {
    const r = records[i];
    if (!r || r.isDead || r.opcode === undefined) continue;
    if (r.noOptimize || r.mnemonic === undefined) return true;
    const effect = effectOf(r.mnemonic, r.operandInfo, features);
    if (effect.reads.some((res) => pending.has(res))) return true;
    if (effect.controlTransfer) return true;
    for (const w of effect.writes) pending.delete(w);
  }
  return false;
}
