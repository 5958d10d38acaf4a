#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { createRequire } from 'node:module';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';
import { dialectNames, findDialect } from './frontend/dialects.js';
import { optimizeFile } from './optimizer.js';
import type { CpuTarget, OptimizationMode, TraceLevel } from './pipeline.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  cpu: CpuTarget;
  mode: OptimizationMode;
  dialect: string;
  trace: TraceLevel;
  report: boolean;
  inline: boolean;
};

function usage(): string {
  return [
    'opt65 [options] <input.asm>',
    '',
    'Options:',
    '  -o, --output <file>   Output path (default: <input>.opt.asm)',
    '  -c, --cpu <cpu>       Target CPU: 6502|65c02|65816|45gs02 (default: 6502)',
    '      --speed           Optimize for speed (default)',
    '      --size            Optimize for size',
    '  -m, --mode <mode>     Optimization mode: speed|size',
    `  -a, --asm <dialect>   Assembler syntax: ${dialectNames.join('|')} (default: generic)`,
    '  -t, --trace <level>   Trace level: 0|1|2 (default: 0)',
    '      --report          Also write <output>.report.txt',
    '      --no-inline       Do not inline single-use subroutines',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - <input.asm> must be the last argument.',
    '  - Source lines between ";#NOOPT" and ";#OPT" comments are left untouched.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function isCpu(v: string): v is CpuTarget {
  return v === '6502' || v === '65c02' || v === '65816' || v === '45gs02';
}

function isMode(v: string): v is OptimizationMode {
  return v === 'speed' || v === 'size';
}

function parseTrace(v: string): TraceLevel {
  if (v === '0') return 0;
  if (v === '1') return 1;
  if (v === '2') return 2;
  return fail(`Unsupported --trace "${v}" (expected 0|1|2)`);
}

/**
 * Value of an option given as `--name=value` or `--name value`; advances `state.i` for the latter.
 */
function optionValue(argv: string[], state: { i: number }, a: string, long: string): string {
  const prefix = `${long}=`;
  const v = a.startsWith(prefix) ? a.slice(prefix.length) : argv[++state.i];
  if (!v) fail(`${a.startsWith(prefix) ? long : a} expects a value`);
  return v;
}

function matches(a: string, short: string | undefined, long: string): boolean {
  return a === short || a === long || a.startsWith(`${long}=`);
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let cpu: CpuTarget = '6502';
  let mode: OptimizationMode = 'speed';
  let dialect = 'generic';
  let trace: TraceLevel = 0;
  let report = false;
  let inline = true;
  let entryFile: string | undefined;

  const state = { i: 0 };
  for (; state.i < argv.length; state.i++) {
    const a = argv[state.i]!;
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      const require = createRequire(import.meta.url);
      const here = dirname(fileURLToPath(import.meta.url));
      // Built entry lives in dist/src/; the package root is two levels up.
      const packageJsonPath = resolve(here, '..', '..', 'package.json');
      const pkg = require(packageJsonPath) as { version?: unknown };
      process.stdout.write(`${String(pkg.version ?? '0.0.0')}\n`);
      return { code: 0 };
    }
    if (matches(a, '-o', '--output')) {
      outputPath = optionValue(argv, state, a, '--output');
      continue;
    }
    if (matches(a, '-c', '--cpu')) {
      const v = optionValue(argv, state, a, '--cpu').toLowerCase();
      if (!isCpu(v)) fail(`Unsupported --cpu "${v}" (expected 6502|65c02|65816|45gs02)`);
      cpu = v;
      continue;
    }
    if (a === '--speed' || a === '--size') {
      mode = a === '--speed' ? 'speed' : 'size';
      continue;
    }
    if (matches(a, '-m', '--mode')) {
      const v = optionValue(argv, state, a, '--mode');
      if (!isMode(v)) fail(`Unsupported --mode "${v}" (expected speed|size)`);
      mode = v;
      continue;
    }
    if (matches(a, '-a', '--asm')) {
      const v = optionValue(argv, state, a, '--asm');
      if (!findDialect(v)) fail(`Unsupported --asm "${v}" (expected ${dialectNames.join('|')})`);
      dialect = v;
      continue;
    }
    if (matches(a, '-t', '--trace')) {
      trace = parseTrace(optionValue(argv, state, a, '--trace'));
      continue;
    }
    if (a === '--report') {
      report = true;
      continue;
    }
    if (a === '--no-inline') {
      inline = false;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || state.i !== argv.length - 1) {
      fail(`Expected exactly one <input.asm> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <input.asm> argument (and it must be last)`);
  }

  return {
    entryFile,
    ...(outputPath ? { outputPath } : {}),
    cpu,
    mode,
    dialect,
    trace,
    report,
    inline,
  };
}

/**
 * Output path: `--output` as given, or `<input stem>.opt.asm` beside the input.
 */
export function defaultOutputPath(entryFile: string, outputPath?: string): string {
  if (outputPath) return resolve(outputPath);
  const entry = resolve(entryFile);
  const ext = extname(entry);
  const stem = ext.length > 0 ? entry.slice(0, -ext.length) : entry;
  return `${stem}.opt${ext.length > 0 ? ext : '.asm'}`;
}

function reportPath(outputPath: string): string {
  const ext = extname(outputPath);
  const base = ext.length > 0 ? outputPath.slice(0, -ext.length) : outputPath;
  return `${base}.report.txt`;
}

async function writeArtifacts(outputPath: string, artifacts: Artifact[]): Promise<void> {
  const writes: Array<Promise<void>> = [];
  const written: string[] = [];
  await mkdir(dirname(outputPath), { recursive: true });

  for (const a of artifacts) {
    const path = a.kind === 'asm' ? outputPath : reportPath(outputPath);
    writes.push(writeFile(path, a.text, 'utf8'));
    written.push(path);
  }
  await Promise.all(writes);
  for (const p of written) process.stdout.write(`${p}\n`);
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0 && !Number.isNaN(lineCmp)) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0 && !Number.isNaN(colCmp)) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const outputPath = defaultOutputPath(parsed.entryFile, parsed.outputPath);

    const res = await optimizeFile(
      parsed.entryFile,
      {
        cpu: parsed.cpu,
        mode: parsed.mode,
        dialect: parsed.dialect,
        trace: parsed.trace,
        emitReport: parsed.report,
        inline: parsed.inline,
      },
      { formats: defaultFormatWriters },
    );

    const sortedDiagnostics = [...res.diagnostics].sort(compareDiagnosticsForCli);
    for (const d of sortedDiagnostics) {
      const loc =
        d.line !== undefined
          ? `${d.file}:${d.line}${d.column !== undefined ? `:${d.column}` : ''}`
          : d.file;
      process.stderr.write(`${loc}: ${d.severity}: [${d.id}] ${d.message}\n`);
    }

    if (sortedDiagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    await writeArtifacts(outputPath, res.artifacts);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`opt65: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function stripExtendedWindowsPrefix(path: string): string {
  if (path.startsWith('\\\\?\\UNC\\')) return `\\\\${path.slice(8)}`;
  if (path.startsWith('\\\\?\\')) return path.slice(4);
  return path;
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const stripped = stripExtendedWindowsPrefix(real);
  const normalized = stripped.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  if (normalizePathForCompare(invokedAs) === normalizePathForCompare(self)) return true;

  // npm bin shims can surface a different spelling of the same path.
  return (
    normalizePathForCompare(invokedAs).endsWith('/dist/src/cli.js') &&
    normalizePathForCompare(self).endsWith('/dist/src/cli.js')
  );
}

if (isDirectCliInvocation(process.argv[1])) {
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
