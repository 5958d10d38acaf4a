import type { AsmRecord } from '../frontend/ast.js';
import { isImmediateValue, sameImmediate } from '../cpu/operand.js';
import type { Resource } from '../cpu/effects.js';
import { effectOf, stzAddressable } from '../cpu/effects.js';
import type { MatchableRecord, PassContext, OptimizationPass } from './pass.js';
import { isMatchable, kill, liveAfter, matchWindow, nextLive, rewrite, windowRecords } from './pass.js';

const NAME = 'cpu45gs02';

const RUN_BARRIER: readonly Resource[] = ['reg:A', 'reg:Z', 'flag:N', 'flag:Z'];

function touchesAny(r: MatchableRecord, ctx: PassContext, resources: readonly Resource[]): boolean {
  const effect = effectOf(r.mnemonic, r.operandInfo, ctx.features);
  if (effect.controlTransfer) return true;
  return [...effect.reads, ...effect.writes, ...effect.disturbs].some((res) => resources.includes(res));
}

/**
 * `LDA #v` followed by two or more stores of that value: `LDZ #v` plus `STZ` stores.
 *
 * Repeated `LDA #v` inside the run are dropped. The run passes only over instructions that touch neither
 * A, Z nor N/Z.
 */
function sameValueStores(ctx: PassContext, i: number): number {
  const { records } = ctx.program;
  const load = records[i];
  if (!isMatchable(load) || load.mnemonic !== 'LDA' || load.operandInfo.mode !== 'immediate') return 0;

  const stores: AsmRecord[] = [];
  const reloads: AsmRecord[] = [];
  let last = i;
  for (let j = nextLive(records, i); j >= 0; j = nextLive(records, j)) {
    const r = records[j];
    if (!isMatchable(r) || r.isBranchTarget) break;
    if (r.mnemonic === 'STA' && stzAddressable(r.operandInfo)) {
      stores.push(r);
      last = j;
      continue;
    }
    if (r.mnemonic === 'LDA' && sameImmediate(load.operandInfo, r.operandInfo)) {
      reloads.push(r);
      last = j;
      continue;
    }
    if (touchesAny(r, ctx, RUN_BARRIER)) break;
  }
  if (stores.length < 2) return 0;
  if (liveAfter(ctx, last, ['reg:A', 'reg:Z'])) return 0;

  rewrite(load, 'LDZ', undefined, NAME);
  for (const s of stores) rewrite(s, 'STZ', undefined, NAME);
  let count = 1 + stores.length;
  for (const r of reloads) if (kill(r, NAME)) count++;
  return count;
}

/**
 * `EOR #$FF; SEC; ADC #$00` becomes `NEG` when the carry and overflow it leaves are not read.
 */
function negate(ctx: PassContext, i: number): number {
  const { records } = ctx.program;
  const w = matchWindow(records, i, 3);
  if (!w) return 0;
  const [eor, sec, adc] = windowRecords(records, w);
  const adcIndex = w[2];
  if (!eor || !sec || !adc || adcIndex === undefined) return 0;
  if (eor.mnemonic !== 'EOR' || !isImmediateValue(eor.operandInfo, 0xff)) return 0;
  if (sec.mnemonic !== 'SEC') return 0;
  if (adc.mnemonic !== 'ADC' || !isImmediateValue(adc.operandInfo, 0)) return 0;
  if (liveAfter(ctx, adcIndex, ['flag:C', 'flag:V'])) return 0;
  rewrite(eor, 'NEG', null, NAME);
  kill(sec, NAME);
  kill(adc, NAME);
  return 1;
}

/**
 * `CMP #$80; ROR` (accumulator) becomes `ASR`: the compare copies bit 7 into carry for the rotate.
 */
function arithmeticShift(ctx: PassContext, i: number): number {
  const { records } = ctx.program;
  const w = matchWindow(records, i, 2);
  if (!w) return 0;
  const [cmp, ror] = windowRecords(records, w);
  if (!cmp || !ror) return 0;
  if (cmp.mnemonic !== 'CMP' || !isImmediateValue(cmp.operandInfo, 0x80)) return 0;
  const mode = ror.operandInfo.mode;
  if (ror.mnemonic !== 'ROR' || (mode !== 'accumulator' && mode !== 'none')) return 0;
  rewrite(cmp, 'ASR', ror.operand ?? null, NAME);
  kill(ror, NAME);
  return 1;
}

/**
 * 45GS02 rewrites. Runs only when the target is the 45GS02.
 */
export const cpu45gs02: OptimizationPass = {
  name: NAME,
  run(ctx: PassContext): number {
    const { records } = ctx.program;
    let count = 0;
    for (let i = 0; i < records.length; i++) {
      count += sameValueStores(ctx, i);
      count += negate(ctx, i);
      count += arithmeticShift(ctx, i);
    }
    return count;
  },
};
