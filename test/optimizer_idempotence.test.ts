import { describe, expect, it } from 'vitest';
import fc from 'fast-check';

import { DiagnosticIds } from '../src/diagnostics/types.js';
import { optimizeSource } from '../src/optimizer.js';
import type { CpuTarget, OptimizeResult } from '../src/pipeline.js';

const LINES = [
  '    lda #0',
  '    lda #$20',
  '    lda $10',
  '    sta $d020',
  '    sta $10,x',
  '    sta ($fb),y',
  '    tax',
  '    txa',
  '    tay',
  '    tya',
  '    ldx #1',
  '    stx $11',
  '    eor #$ff',
  '    sec',
  '    adc #$00',
  '    cmp #$80',
  '    ror',
  '    inc $10',
  '    beq next',
  '    jmp next',
  '    jsr sub',
  'next:',
  'sub:',
  '    rts',
  '    .byte 1',
  '; note',
  '',
];

const CPUS: CpuTarget[] = ['6502', '65c02', '65816', '45gs02'];

function asmOf(res: OptimizeResult): string {
  return res.artifacts.find((a) => a.kind === 'asm')?.text ?? '';
}

function count(lines: readonly string[], line: string): number {
  return lines.filter((l) => l === line).length;
}

describe('optimizer output', () => {
  it('re-optimizes to itself', () => {
    fc.assert(
      fc.property(
        fc.array(fc.constantFrom(...LINES), { maxLength: 14 }),
        fc.constantFrom(...CPUS),
        (lines, cpu) => {
          const input = `${lines.join('\n')}\n`;
          const once = asmOf(optimizeSource('p.asm', input, { cpu, maxIterations: 50 }));
          const twice = asmOf(optimizeSource('p.asm', once, { cpu, maxIterations: 50 }));
          expect(twice).toBe(once);
        },
      ),
      { numRuns: 300 },
    );
  });

  it('keeps every label line the inliner did not take', () => {
    fc.assert(
      fc.property(
        fc.array(fc.constantFrom(...LINES), { maxLength: 14 }),
        fc.constantFrom(...CPUS),
        (lines, cpu) => {
          const res = optimizeSource('p.asm', `${lines.join('\n')}\n`, { cpu, maxIterations: 50 });
          const out = asmOf(res).split('\n');
          const inlined = res.diagnostics.filter((d) => d.id === DiagnosticIds.Inlined).length;
          expect(count(out, 'next:')).toBe(count(lines, 'next:'));
          expect(count(out, 'sub:')).toBe(count(lines, 'sub:') - inlined);
        },
      ),
      { numRuns: 300 },
    );
  });

  it('never changes a program it cannot improve', () => {
    const input = 'start:\n    ldx #0\nloop:\n    inx\n    bne loop\n    rts\n';
    expect(asmOf(optimizeSource('p.asm', input, { cpu: '65c02' }))).toBe(input);
  });
});
