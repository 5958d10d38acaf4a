import { describe, expect, it } from 'vitest';

import type { AsmRecord } from '../src/frontend/ast.js';
import { cpuFeatures } from '../src/cpu/mnemonics.js';
import type { CpuState } from '../src/semantics/registers.js';
import { step, unknownState } from '../src/semantics/registers.js';
import { isLiveAfter } from '../src/semantics/liveness.js';
import { analyze } from '../src/semantics/labels.js';
import { program, record } from './helpers/program.js';

const nmos = cpuFeatures('6502');
const mega = cpuFeatures('45gs02');

function run(texts: string[], start: CpuState = unknownState()): CpuState {
  return texts.reduce((s, t) => step(record(t), s, nmos), start);
}

describe('register/flag tracker', () => {
  it('tracks immediate loads with their N/Z results', () => {
    const s = run(['    lda #$80']);
    expect(s.regs.A).toEqual({ known: true, zero: false, value: 0x80, expr: '$80', modified: true });
    expect(s.flags.N).toEqual({ known: true, set: true });
    expect(s.flags.Z).toEqual({ known: true, set: false });
  });

  it('uses bit 15 for the sign of 16-bit values', () => {
    const s = run(['    lda #$8000']);
    expect(s.flags.N).toEqual({ known: true, set: true });
    const t = run(['    ldx #$1234']);
    expect(t.flags.N).toEqual({ known: true, set: false });
  });

  it('keeps symbolic immediates without a value', () => {
    const s = run(['    lda #label']);
    expect(s.regs.A).toEqual({ known: true, zero: false, expr: 'label', modified: true });
    expect(s.flags.N.known).toBe(false);
  });

  it('copies values through transfers', () => {
    const s = run(['    ldx #0', '    txa']);
    expect(s.regs.A).toEqual({ known: true, zero: true, value: 0, expr: '0', modified: true });
    expect(s.regs.X.modified).toBe(false);
    expect(s.flags.Z).toEqual({ known: true, set: true });
  });

  it('forgets written registers and applies known flag results', () => {
    const s = run(['    lda #$80', '    lsr']);
    expect(s.regs.A.known).toBe(false);
    expect(s.flags.N).toEqual({ known: true, set: false });
    expect(s.flags.C.known).toBe(false);
    expect(run(['    clc']).flags.C).toEqual({ known: true, set: false });
    expect(run(['    sec']).flags.C).toEqual({ known: true, set: true });
  });

  it('leaves state alone for stores and untouched flags', () => {
    const s = run(['    lda #1', '    sec', '    sta $10', '    cmp #1']);
    expect(s.regs.A.value).toBe(1);
    expect(s.regs.A.modified).toBe(false);
    expect(s.flags.C.known).toBe(false);
    expect(s.flags.V.known).toBe(false);
  });

  it('forgets everything at calls and opaque records', () => {
    const afterCall = run(['    lda #1', '    jsr work']);
    expect(afterCall.regs.A).toEqual({ known: false, zero: false, modified: true });
    const afterMacro = run(['    lda #1', '    +copy_block']);
    expect(afterMacro.regs.A.known).toBe(false);
  });

  it('forgets everything at branch targets', () => {
    const p = program(['    ldx #1', 'loop:', '    nop']);
    analyze(p);
    const records: AsmRecord[] = p.records;
    const s = records.reduce((state, r) => step(r, state, nmos), unknownState());
    expect(s.regs.X.known).toBe(false);
  });

  it('passes dead records over unchanged', () => {
    const dead = record('    lda #2');
    dead.isDead = true;
    const s = step(dead, run(['    lda #1']), nmos);
    expect(s.regs.A.value).toBe(1);
  });

  it('treats the 45GS02 Z register apart from the zero flag', () => {
    const s = [record('    ldz #0'), record('    lda #1')].reduce((st, r) => step(r, st, mega), unknownState());
    expect(s.regs.Z).toEqual({ known: true, zero: true, value: 0, expr: '0', modified: false });
    expect(s.flags.Z).toEqual({ known: true, set: false });
  });
});

describe('isLiveAfter', () => {
  const live = (lines: string[], index: number, resources: Parameters<typeof isLiveAfter>[2]): boolean =>
    isLiveAfter(program(lines).records, index, resources, nmos);

  it('is live when read before being overwritten', () => {
    expect(live(['    lda #1', '    sta $10'], 0, ['reg:A'])).toBe(true);
    expect(live(['    lda #1', '    lda #2', '    sta $10'], 0, ['reg:A'])).toBe(false);
  });

  it('is dead at the end of the stream', () => {
    expect(live(['    lda #1'], 0, ['reg:A'])).toBe(false);
  });

  it('is live across control transfers, opaque and disabled records', () => {
    expect(live(['    lda #1', '    rts'], 0, ['reg:A'])).toBe(true);
    expect(live(['    lda #1', '    .byte 1'], 0, ['reg:A'])).toBe(true);
    expect(live(['    lda #1', ';#NOOPT', '    nop'], 0, ['reg:A'])).toBe(true);
  });

  it('passes over labels and comments', () => {
    expect(live(['    lda #1', 'next:', '; note', '    sta $10'], 0, ['reg:A'])).toBe(true);
  });

  it('tracks each resource separately', () => {
    expect(live(['    tax', '    txa', '    cmp #1'], 1, ['reg:X', 'flag:N', 'flag:Z'])).toBe(false);
    expect(live(['    tax', '    txa', '    beq out'], 1, ['reg:X', 'flag:N', 'flag:Z'])).toBe(true);
  });
});
