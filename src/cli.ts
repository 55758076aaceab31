#!/usr/bin/env node
import { existsSync, realpathSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compareBitstream, formatComparison } from './compare/compare.js';
import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';
import type { PlacementOptions, PlacementStrategy } from './placement/placer.js';
import { PlacementStrategies } from './placement/placer.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  configMask?: string;
  placement: PlacementOptions;
  emitBitstream: boolean;
  emitBin: boolean;
  emitParsed: boolean;
  emitDump: boolean;
  emitModules: boolean;
  emitPlacement: boolean;
  comparePath?: string;
  quiet: boolean;
};

function usage(): string {
  return [
    'dfbit [options] <config.json>',
    '',
    'Options:',
    '  -o, --output <base>     Artifact base path (default: config path without extension)',
    '      --mask <bits>       8-digit config enable mask (default: 11101110)',
    '      --strategy <s>      Placement strategy: allocate|exact|heuristic|auto (default: auto)',
    '      --iterations <n>    Annealing moves per restart (default: 5000)',
    '      --restarts <n>      Annealing restarts (default: 1)',
    '      --seed <n>          Annealing seed (default: 1)',
    '      --timeout <ms>      Exact placement time limit (default: 2000)',
    '      --nobitstream       Suppress .bitstream.txt',
    '      --nobin             Suppress .bin',
    '      --noparsed          Suppress .parsed.txt',
    '      --dump              Also write the per-field dump (.dump.txt)',
    '      --modules           Also write the unframed module bits (.modules.txt)',
    '      --placement         Also write the placement summary (.placement.txt)',
    '      --compare <file>    Compare the generated stream with a reference text bitstream',
    '  -q, --quiet             Only print error diagnostics',
    '  -V, --version           Print version',
    '  -h, --help              Show help',
    '',
    'Notes:',
    '  - <config.json> must be the last argument.',
    '  - Artifacts are written next to the artifact base path.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function readVersion(): string {
  const require = createRequire(import.meta.url);
  const here = dirname(fileURLToPath(import.meta.url));
  // Sources sit one level below the package root; the build output two.
  const candidates = [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')];
  const packageJsonPath = candidates.find((p) => existsSync(p));
  if (!packageJsonPath) return '0.0.0';
  const pkg = require(packageJsonPath) as { version?: unknown };
  return String(pkg.version ?? '0.0.0');
}

function parseInteger(flag: string, v: string, min: number): number {
  if (!/^-?\d+$/.test(v)) fail(`${flag} expects an integer (got "${v}")`);
  const n = Number.parseInt(v, 10);
  if (n < min) fail(`${flag} must be >= ${min} (got ${n})`);
  return n;
}

function isStrategy(v: string): v is PlacementStrategy {
  return PlacementStrategies.some((s) => s === v);
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let configMask: string | undefined;
  const placement: PlacementOptions = {};
  let emitBitstream = true;
  let emitBin = true;
  let emitParsed = true;
  let emitDump = false;
  let emitModules = false;
  let emitPlacement = false;
  let comparePath: string | undefined;
  let quiet = false;
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]!;

    // `--flag=value` or `--flag value`
    const valueOf = (long: string, short?: string): string | undefined => {
      if (a.startsWith(`${long}=`)) {
        const v = a.slice(long.length + 1);
        if (!v) fail(`${long} expects a value`);
        return v;
      }
      if (a !== long && a !== short) return undefined;
      const v = argv[++i];
      if (!v) fail(`${a} expects a value`);
      return v;
    };

    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${readVersion()}\n`);
      return { code: 0 };
    }
    const output = valueOf('--output', '-o');
    if (output !== undefined) {
      outputPath = output;
      continue;
    }
    const mask = valueOf('--mask');
    if (mask !== undefined) {
      if (!/^[01]{8}$/.test(mask)) fail(`--mask expects 8 binary digits (got "${mask}")`);
      configMask = mask;
      continue;
    }
    const strategy = valueOf('--strategy');
    if (strategy !== undefined) {
      if (!isStrategy(strategy)) {
        fail(`Unsupported --strategy "${strategy}" (expected ${PlacementStrategies.join('|')})`);
      }
      placement.strategy = strategy;
      continue;
    }
    const iterations = valueOf('--iterations');
    if (iterations !== undefined) {
      placement.iterations = parseInteger('--iterations', iterations, 1);
      continue;
    }
    const restarts = valueOf('--restarts');
    if (restarts !== undefined) {
      placement.restarts = parseInteger('--restarts', restarts, 1);
      continue;
    }
    const seed = valueOf('--seed');
    if (seed !== undefined) {
      placement.seed = parseInteger('--seed', seed, Number.MIN_SAFE_INTEGER);
      continue;
    }
    const timeout = valueOf('--timeout');
    if (timeout !== undefined) {
      placement.timeoutMs = parseInteger('--timeout', timeout, 0);
      continue;
    }
    const compare = valueOf('--compare');
    if (compare !== undefined) {
      comparePath = compare;
      continue;
    }
    if (a === '--nobitstream') {
      emitBitstream = false;
      continue;
    }
    if (a === '--nobin') {
      emitBin = false;
      continue;
    }
    if (a === '--noparsed') {
      emitParsed = false;
      continue;
    }
    if (a === '--dump') {
      emitDump = true;
      continue;
    }
    if (a === '--modules') {
      emitModules = true;
      continue;
    }
    if (a === '--placement') {
      emitPlacement = true;
      continue;
    }
    if (a === '-q' || a === '--quiet') {
      quiet = true;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <config.json> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <config.json> argument (and it must be last)`);
  }

  return {
    entryFile,
    ...(outputPath ? { outputPath } : {}),
    ...(configMask ? { configMask } : {}),
    placement,
    emitBitstream,
    emitBin,
    emitParsed,
    emitDump,
    emitModules,
    emitPlacement,
    ...(comparePath ? { comparePath } : {}),
    quiet,
  };
}

function artifactBase(entryFile: string, outputPath?: string): string {
  const target = resolve(outputPath ?? entryFile);
  const ext = extname(target);
  return ext.length > 0 ? target.slice(0, -ext.length) : target;
}

/** File suffix of each artifact kind. */
const ARTIFACT_SUFFIX: Record<Artifact['kind'], string> = {
  bitstream: '.bitstream.txt',
  bin: '.bin',
  parsed: '.parsed.txt',
  dump: '.dump.txt',
  modules: '.modules.txt',
  placement: '.placement.txt',
};

async function writeArtifacts(base: string, artifacts: Artifact[]): Promise<string[]> {
  const written: string[] = [];
  const writes: Array<Promise<void>> = [];
  const ensureDir = async (p: string) => mkdir(dirname(p), { recursive: true });

  for (const artifact of artifacts) {
    const path = `${base}${ARTIFACT_SUFFIX[artifact.kind]}`;
    await ensureDir(path);
    writes.push(
      artifact.kind === 'bin'
        ? writeFile(path, Buffer.from(artifact.bytes))
        : writeFile(path, artifact.text, 'utf8'),
    );
    written.push(path);
  }

  await Promise.all(writes);
  return written;
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

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

    const base = artifactBase(parsed.entryFile, parsed.outputPath);

    const res = await compile(
      parsed.entryFile,
      {
        ...(parsed.configMask ? { configMask: parsed.configMask } : {}),
        placement: parsed.placement,
        emitBitstream: parsed.emitBitstream,
        emitBin: parsed.emitBin,
        emitParsed: parsed.emitParsed,
        emitDump: parsed.emitDump,
        emitModules: parsed.emitModules,
        emitPlacement: parsed.emitPlacement,
      },
      { formats: defaultFormatWriters },
    );

    const sortedDiagnostics = [...res.diagnostics].sort(compareDiagnosticsForCli);
    for (const d of sortedDiagnostics) {
      if (parsed.quiet && d.severity !== 'error') continue;
      const loc = d.path !== undefined ? `${d.file} (${d.path})` : d.file;
      process.stderr.write(`${loc}: ${d.severity}: [${d.id}] ${d.message}\n`);
    }

    if (sortedDiagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    const written = await writeArtifacts(base, res.artifacts);
    const primary = written.find((p) => p.endsWith(ARTIFACT_SUFFIX.bitstream)) ?? written[0];
    if (primary) process.stdout.write(`${primary}\n`);

    if (parsed.comparePath && res.bitstream) {
      let referenceText: string;
      try {
        referenceText = await readFile(resolve(parsed.comparePath), 'utf8');
      } catch (err) {
        process.stderr.write(`dfbit: failed to read reference bitstream: ${String(err)}\n`);
        return 1;
      }
      const report = compareBitstream(res.bitstream, referenceText);
      process.stdout.write(formatComparison(report));
      if (!report.match) return 1;
    }
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`dfbit: ${msg}\n`);
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

function samePath(a: string, b: string): boolean {
  return normalizePathForCompare(a) === normalizePathForCompare(b);
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  if (samePath(invokedAs, self)) return true;

  const invoked = normalizePathForCompare(invokedAs);
  const normalizedSelf = normalizePathForCompare(self);
  // Windows CI can surface different canonical path spellings for the same file.
  // Fall back to stable suffix matching for the built CLI entry path.
  return invoked.endsWith('/dist/src/cli.js') && normalizedSelf.endsWith('/dist/src/cli.js');
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
