import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { analyze, resolveTarget } from '../src/semantics/labels.js';
import { program } from './helpers/program.js';

const SCOPED = [
  'main:',
  '    jsr sub',
  '    jmp @done',
  '@done:',
  '    rts',
  'sub:',
  '    lda #1',
  '@done:',
  '    rts',
];

describe('label analysis', () => {
  it('scopes local labels to the preceding global label', () => {
    const p = program(SCOPED);
    const table = analyze(p);
    expect(table.entries.map((e) => [e.name, e.index, e.isLocal])).toEqual([
      ['main', 0, false],
      ['@done', 3, true],
      ['sub', 5, false],
      ['@done', 7, true],
    ]);
    expect(resolveTarget(p, table, '@done', 2)?.index).toBe(3);
    expect(resolveTarget(p, table, '@done', 8)?.index).toBe(7);
    expect(resolveTarget(p, table, 'nowhere', 2)).toBeUndefined();
  });

  it('collects references and marks call targets as subroutines', () => {
    const p = program(SCOPED);
    const table = analyze(p);
    const sub = table.globals.get('sub');
    expect(sub?.references).toEqual([1]);
    expect(sub?.isSubroutine).toBe(true);
    expect(sub?.bodyEnd).toBe(8);
    expect(table.entries[1]?.references).toEqual([2]);
    expect(table.entries[1]?.isSubroutine).toBe(false);
    expect(table.entries[3]?.references).toEqual([]);
  });

  it('flags labelled records as branch targets', () => {
    const p = program(SCOPED);
    analyze(p);
    expect(p.records.map((r) => r.isBranchTarget)).toEqual([
      true,
      false,
      false,
      true,
      false,
      true,
      false,
      true,
      false,
    ]);
  });

  it('finds references inside expressions', () => {
    const p = program(['    lda #<msg', '    ldx #>msg', '    rts', 'msg:', '    .byte 1']);
    const table = analyze(p);
    expect(table.globals.get('msg')?.references).toEqual([0, 1]);
  });

  it('compares labels by dialect case rules', () => {
    const generic = analyze(program(['    jsr Sub', '    rts', 'sub:', '    rts']));
    expect(generic.globals.get('sub')?.references).toEqual([0]);

    const tass = analyze(program(['    jsr Sub', '    rts', 'sub:', '    rts'], '64tass'));
    expect(tass.globals.get('sub')?.references).toEqual([]);
  });

  it('keeps the first definition of a duplicated label', () => {
    const table = analyze(program(['twice:', '    nop', 'twice:', '    rts']));
    expect(table.entries.map((e) => e.index)).toEqual([0]);
  });

  it('reports subroutines without a return before the next global label', () => {
    const diagnostics: Diagnostic[] = [];
    const p = program(['    jsr far', '    rts', 'far:', '    lda #1', 'next:', '    rts']);
    const table = analyze(p, diagnostics);
    expect(table.globals.get('far')?.bodyEnd).toBeUndefined();
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.SubroutineUnbounded,
        severity: 'info',
        message: 'Subroutine "far" has no return before the next global label; it is left as is.',
        file: 'test.asm',
        line: 3,
      },
    ]);
  });

  it('ignores dead records', () => {
    const p = program(['    jsr sub', '    rts', 'sub:', '    rts']);
    const call = p.records[0];
    if (call) call.isDead = true;
    const table = analyze(p);
    expect(table.globals.get('sub')?.references).toEqual([]);
    expect(table.globals.get('sub')?.isSubroutine).toBe(false);
  });
});
