import { describe, expect, it } from 'vitest';

import { cpuFeatures } from '../src/cpu/mnemonics.js';
import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { inlineSubroutines } from '../src/optimize/inline.js';
import { liveCode, program } from './helpers/program.js';

const nmos = cpuFeatures('6502');

function inline(lines: string[]): { events: number; code: string[]; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const p = program(lines);
  const events = inlineSubroutines(p, nmos, diagnostics);
  return { events, code: liveCode(p), diagnostics };
}

const SINGLE_USE = ['main:', '    jsr sub', '    lda #1', '    rts', 'sub:', '    ldx #2', '    stx $10', '    rts'];

describe('inliner', () => {
  it('copies a single-use subroutine into its call site', () => {
    const res = inline(SINGLE_USE);
    expect(res.events).toBe(1);
    expect(res.code).toEqual(['ldx #2', 'stx $10', 'lda #1', 'rts']);
    expect(res.diagnostics).toEqual([
      {
        id: DiagnosticIds.Inlined,
        severity: 'info',
        message: 'Inlined subroutine "sub" (2 instruction(s)) at its only call.',
        file: 'test.asm',
        line: 2,
      },
    ]);
  });

  it('marks copies with their origin and the originals as removed', () => {
    const diagnostics: Diagnostic[] = [];
    const p = program(SINGLE_USE);
    inlineSubroutines(p, nmos, diagnostics);
    expect(p.records).toHaveLength(10);
    expect(p.records[2]?.inlinedFrom).toBe('sub');
    expect(p.records[2]?.label).toBeUndefined();
    expect(p.records.filter((r) => r.removedBy === 'inline').map((r) => r.line)).toEqual([2, 5, 6, 7, 8]);
  });

  it('leaves subroutines called more than once', () => {
    const res = inline(['    jsr sub', '    jsr sub', '    rts', 'sub:', '    nop', '    rts']);
    expect(res.events).toBe(0);
  });

  it('leaves bodies that code can fall into', () => {
    expect(inline(['    jsr sub', '    lda #1', 'sub:', '    ldx #2', '    rts']).events).toBe(0);
    expect(inline(['    jsr sub', '    rts', 'next:', 'sub:', '    ldx #2', '    rts']).events).toBe(0);
  });

  it('looks past removed records for the fall-through check', () => {
    const diagnostics: Diagnostic[] = [];
    const p = program(['    jsr sub', '    rts', '    nop', 'sub:', '    inx', '    rts']);
    const nop = p.records[2];
    if (nop) nop.isDead = true;
    expect(inlineSubroutines(p, nmos, diagnostics)).toBe(1);
    expect(liveCode(p)).toEqual(['inx', 'rts']);
  });

  it('leaves bodies with calls, branches or inner labels', () => {
    expect(inline(['    jsr sub', '    rts', 'sub:', '    jsr other', '    rts']).events).toBe(0);
    expect(inline(['    jsr sub', '    rts', 'sub:', '    beq sub', '    rts']).events).toBe(0);
    expect(inline(['    jsr sub', '    rts', 'sub:', '    nop', '@inner:', '    rts']).events).toBe(0);
  });

  it('leaves bodies that touch the return address on the stack', () => {
    expect(inline(['    jsr sub', '    rts', 'sub:', '    pla', '    rts']).events).toBe(0);
    expect(inline(['    jsr sub', '    rts', 'sub:', '    pha', '    rts']).events).toBe(0);
    expect(inline(['    jsr sub', '    rts', 'sub:', '    tsx', '    rts']).events).toBe(0);
    expect(inline(['    jsr sub', '    rts', 'sub:', '    pha', '    pla', '    rts']).events).toBe(1);
  });

  it('leaves optimization-disabled bodies', () => {
    expect(inline(['    jsr sub', '    rts', ';#NOOPT', 'sub:', '    nop', '    rts']).events).toBe(0);
  });

  it('inlines nested single-use subroutines one event at a time', () => {
    const res = inline(['    jsr outer', '    rts', 'outer:', '    jsr inner', '    rts', 'inner:', '    inx', '    rts']);
    expect(res.events).toBe(2);
    expect(res.code).toEqual(['inx', 'rts']);
    expect(res.diagnostics.map((d) => d.message)).toEqual([
      'Inlined subroutine "inner" (1 instruction(s)) at its only call.',
      'Inlined subroutine "outer" (1 instruction(s)) at its only call.',
    ]);
  });
});
