import { describe, expect, it } from 'vitest';

import { loadStore } from '../src/optimize/loadStore.js';
import { peephole } from '../src/optimize/peephole.js';
import { runPass } from './helpers/program.js';

describe('peephole: redundant immediate reload', () => {
  it('drops LDA #v after LDA #v; STA', () => {
    const res = runPass(peephole, ['    lda #$00', '    sta $d020', '    lda #0', '    sta $d021']);
    expect(res.count).toBe(1);
    expect(res.code).toEqual(['lda #$00', 'sta $d020', 'sta $d021']);
    expect(res.program.records[2]?.removedBy).toBe('peephole');
  });

  it('keeps a reload of a different value', () => {
    expect(runPass(peephole, ['    lda #1', '    sta $10', '    lda #2']).count).toBe(0);
  });

  it('passes over blank and comment-only lines', () => {
    const res = runPass(peephole, ['    lda #1', '; note', '    sta $10', '', '    lda #1']);
    expect(res.count).toBe(1);
    expect(res.program.records[1]?.isDead).toBe(false);
    expect(res.program.records[3]?.isDead).toBe(false);
  });

  it('never matches across a label', () => {
    expect(runPass(peephole, ['    lda #1', '    sta $10', 'loop:', '    lda #1']).count).toBe(0);
    expect(runPass(peephole, ['    lda #1', '    sta $10', 'loop: lda #1']).count).toBe(0);
  });

  it('leaves optimization-disabled records alone', () => {
    expect(runPass(peephole, ['    lda #1', '    sta $10 ;#NOOPT', '    lda #1']).count).toBe(0);
  });
});

describe('loadStore: redundant memory reload', () => {
  it('drops the reload when the store goes elsewhere', () => {
    const res = runPass(loadStore, ['    lda $10', '    sta $20', '    lda $10']);
    expect(res.count).toBe(1);
    expect(res.code).toEqual(['lda $10', 'sta $20']);
  });

  it('drops the reload when the store writes the loaded byte back', () => {
    const same = runPass(loadStore, ['    lda $10', '    sta $10', '    lda $10']);
    expect(same.count).toBe(1);
    expect(same.code).toEqual(['lda $10', 'sta $10']);
    expect(runPass(loadStore, ['    lda counter', '    sta counter', '    lda counter']).count).toBe(1);
    expect(runPass(loadStore, ['    lda $1000,x', '    sta $1080', '    lda $1000,x']).count).toBe(1);
  });

  it('drops the reload after an indirect store', () => {
    expect(runPass(loadStore, ['    lda $10', '    sta ($fb),y', '    lda $10']).count).toBe(1);
  });

  it('keeps a pointer load when the store may change the pointer', () => {
    expect(runPass(loadStore, ['    lda ($fb),y', '    sta $fc', '    lda ($fb),y']).count).toBe(0);
    expect(runPass(loadStore, ['    lda ($fb),y', '    sta ptr', '    lda ($fb),y']).count).toBe(0);
    expect(runPass(loadStore, ['    lda ($fb),y', '    sta $10,x', '    lda ($fb),y']).count).toBe(0);
    expect(runPass(loadStore, ['    lda [$fb],z', '    sta $fd', '    lda [$fb],z'], '45gs02').count).toBe(0);
    expect(runPass(loadStore, ['    lda ($fb,x)', '    sta $20', '    lda ($fb,x)']).count).toBe(0);
  });

  it('drops a pointer reload when the store misses the pointer bytes', () => {
    const res = runPass(loadStore, ['    lda ($fb),y', '    sta $fd', '    lda ($fb),y']);
    expect(res.count).toBe(1);
    expect(res.code).toEqual(['lda ($fb),y', 'sta $fd']);
  });

  it('leaves immediate reloads to the peephole pass', () => {
    expect(runPass(loadStore, ['    lda #1', '    sta $10', '    lda #1']).count).toBe(0);
  });
});
