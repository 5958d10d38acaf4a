import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { access, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { defaultOutputPath } from '../src/cli.js';
import { runCliCaptured } from './helpers/cli.js';

const PROGRAM = '    LDA #$00\n    STA $D020\n    LDA #$00\n    STA $D021\n';
const SUMMARY = 'info: [O65400] Validated 3 instruction(s); registers written: A; flags written: N, Z.';

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('cli', () => {
  let work = '';
  let entry = '';

  beforeEach(async () => {
    work = await mkdtemp(join(tmpdir(), 'opt65-cli-'));
    entry = join(work, 'prog.asm');
    await writeFile(entry, PROGRAM, 'utf8');
  });

  afterEach(async () => {
    await rm(work, { recursive: true, force: true });
  });

  it('writes <input>.opt.asm beside the input by default', async () => {
    const res = await runCliCaptured([entry]);
    expect(res.code).toBe(0);
    const out = join(work, 'prog.opt.asm');
    expect(res.stdout).toBe(`${out}\n`);
    expect(res.stderr).toBe(`${entry}: ${SUMMARY}\n`);
    expect(await readFile(out, 'utf8')).toBe('    LDA #$00\n    STA $D020\n    STA $D021\n');
  });

  it('honours --output, --cpu and --report', async () => {
    const out = join(work, 'out', 'result.s');
    const res = await runCliCaptured(['-o', out, '--cpu', '65C02', '--report', entry]);
    expect(res.code).toBe(0);
    const report = join(work, 'out', 'result.report.txt');
    expect(res.stdout).toBe(`${out}\n${report}\n`);
    expect(await readFile(out, 'utf8')).toBe('    STZ $D020\n    STZ $D021\n');
    expect((await readFile(report, 'utf8')).split('\n')[1]).toBe('Target CPU: 65c02');
  });

  it('accepts --name=value forms and the trace level', async () => {
    const out = join(work, 'traced.asm');
    const res = await runCliCaptured([`--output=${out}`, '--trace=1', '--size', entry]);
    expect(res.code).toBe(0);
    expect((await readFile(out, 'utf8')).split('\n')[0]).toBe('; Optimized for size');
  });

  it('selects the assembler dialect', async () => {
    const out = join(work, 'kick.asm');
    const res = await runCliCaptured(['-a', 'kickass', '-t', '1', '-o', out, entry]);
    expect(res.code).toBe(0);
    expect((await readFile(out, 'utf8')).split('\n')[1]).toBe('// Assembler: Kick Assembler');
  });

  it('prints help', async () => {
    const res = await runCliCaptured(['--help']);
    expect(res.code).toBe(0);
    expect(res.stdout.split('\n')[0]).toBe('opt65 [options] <input.asm>');
  });

  it('rejects unknown options and bad values with usage', async () => {
    const unknown = await runCliCaptured(['--fast', entry]);
    expect(unknown.code).toBe(2);
    expect(unknown.stderr.split('\n')[0]).toBe('opt65: Unknown option "--fast"');

    const cpu = await runCliCaptured(['--cpu', 'z80', entry]);
    expect(cpu.code).toBe(2);
    expect(cpu.stderr.split('\n')[0]).toBe('opt65: Unsupported --cpu "z80" (expected 6502|65c02|65816|45gs02)');

    const trace = await runCliCaptured(['--trace', '3', entry]);
    expect(trace.stderr.split('\n')[0]).toBe('opt65: Unsupported --trace "3" (expected 0|1|2)');
  });

  it('requires the input as the single last argument', async () => {
    const none = await runCliCaptured([]);
    expect(none.code).toBe(2);
    expect(none.stderr.split('\n')[0]).toBe('opt65: Expected exactly one <input.asm> argument (and it must be last)');

    const early = await runCliCaptured([entry, '--report']);
    expect(early.code).toBe(2);
    expect(await exists(join(work, 'prog.opt.asm'))).toBe(false);
  });

  it('exits 1 without writing when the input cannot be read', async () => {
    const missing = join(work, 'missing.asm');
    const res = await runCliCaptured([missing]);
    expect(res.code).toBe(1);
    expect(res.stdout).toBe('');
    expect(res.stderr.startsWith(`${missing}: error: [O65001] Failed to read input file:`)).toBe(true);
    expect(await exists(join(work, 'missing.opt.asm'))).toBe(false);
  });
});

describe('defaultOutputPath', () => {
  it('derives the output name from the input', () => {
    expect(defaultOutputPath('/src/game.asm')).toBe('/src/game.opt.asm');
    expect(defaultOutputPath('/src/game.s')).toBe('/src/game.opt.s');
    expect(defaultOutputPath('/src/game')).toBe('/src/game.opt.asm');
    expect(defaultOutputPath('/src/game.asm', '/out/x.asm')).toBe('/out/x.asm');
  });
});
