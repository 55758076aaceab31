import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { access, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { runCli } from '../src/cli.js';

async function run(args: string[]): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const stdout = vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    out.push(String(chunk));
    return true;
  });
  const stderr = vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    err.push(String(chunk));
    return true;
  });
  try {
    const code = await runCli(args);
    return { code, stdout: out.join(''), stderr: err.join('') };
  } finally {
    stdout.mockRestore();
    stderr.mockRestore();
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

const LOOP_CONFIG = { loops: { A: { start: 0, stride: 1, end: 15, last_index: 3 } } };

describe('cli artifacts', () => {
  let work: string;
  let entry: string;

  beforeEach(async () => {
    work = await mkdtemp(join(tmpdir(), 'dfbit-cli-'));
    entry = join(work, 'main.json');
    await writeFile(entry, JSON.stringify(LOOP_CONFIG), 'utf8');
  });

  afterEach(async () => {
    await rm(work, { recursive: true, force: true });
  });

  it('writes sibling artifacts next to the config and prints the bitstream path', async () => {
    const res = await run([entry]);
    expect(res.code).toBe(0);
    expect(res.stdout).toBe(`${join(work, 'main.bitstream.txt')}\n`);
    expect(res.stderr).toBe('');

    expect(await exists(join(work, 'main.bitstream.txt'))).toBe(true);
    expect(await exists(join(work, 'main.bin'))).toBe(true);
    expect(await exists(join(work, 'main.parsed.txt'))).toBe(true);
    expect(await exists(join(work, 'main.dump.txt'))).toBe(false);

    const text = await readFile(join(work, 'main.bitstream.txt'), 'utf8');
    expect(text.split('\n')).toHaveLength(3);
    expect(text.startsWith('11101110')).toBe(true);
    const bin = await readFile(join(work, 'main.bin'));
    expect(bin).toHaveLength(16);
    expect(bin[0]).toBe(0xee);
  });

  it('uses -o as the artifact base and creates its directory', async () => {
    const res = await run(['-o', join(work, 'out', 'build.txt'), entry]);
    expect(res.code).toBe(0);
    expect(res.stdout).toBe(`${join(work, 'out', 'build.bitstream.txt')}\n`);
    expect(await exists(join(work, 'out', 'build.parsed.txt'))).toBe(true);
  });

  it('writes the sidecars on request', async () => {
    const res = await run(['--dump', '--placement', entry]);
    expect(res.code).toBe(0);
    const placement = await readFile(join(work, 'main.placement.txt'), 'utf8');
    expect(placement.startsWith('strategy: exact\ntotal penalty: 0\n')).toBe(true);
    const dump = await readFile(join(work, 'main.dump.txt'), 'utf8');
    expect(dump.startsWith('loops.A:\n')).toBe(true);
  });

  it('writes the unframed module bits with --modules', async () => {
    const res = await run(['--modules', entry]);
    expect(res.code).toBe(0);
    const modules = await readFile(join(work, 'main.modules.txt'), 'utf8');
    expect(modules).toBe('000' + '0' + '000000000000' + '0000000001' + '000000001111' + '0011' + '\n');
    expect(await exists(join(work, 'main.dump.txt'))).toBe(false);
  });

  it('prints the first written artifact when the bitstream is suppressed', async () => {
    const res = await run(['--nobitstream', '--noparsed', entry]);
    expect(res.code).toBe(0);
    expect(res.stdout).toBe(`${join(work, 'main.bin')}\n`);
    expect(await exists(join(work, 'main.bitstream.txt'))).toBe(false);
  });

  it('accepts --flag=value forms', async () => {
    const res = await run(['--strategy=heuristic', '--seed=5', '--mask=10000000', entry]);
    expect(res.code).toBe(0);
    const text = await readFile(join(work, 'main.bitstream.txt'), 'utf8');
    expect(text.startsWith('10000000')).toBe(true);
  });

  it('prints diagnostics and exits 1 on errors', async () => {
    await writeFile(entry, JSON.stringify({ loops: { B: { src_id: 'nope' } } }), 'utf8');
    const res = await run([entry]);
    expect(res.code).toBe(1);
    expect(res.stdout).toBe('');
    expect(res.stderr).toBe(`${entry}: error: [DFB101] B references unknown node "nope".\n`);
    expect(await exists(join(work, 'main.bitstream.txt'))).toBe(false);
  });

  it('prints warnings unless quiet', async () => {
    const feeds = { inport0: { src_id: 'G0.COL_LC' } };
    await writeFile(
      entry,
      JSON.stringify({ groups: { G0: {} }, pes: { P0: feeds, P1: feeds, P2: feeds } }),
      'utf8',
    );
    const loud = await run([entry]);
    expect(loud.code).toBe(0);
    const lines = loud.stderr.trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]!.startsWith(`${entry}: warning: [DFB201] `)).toBe(true);
    expect(lines[1]!.startsWith(`${entry}: warning: [DFB300] `)).toBe(true);

    const quiet = await run(['-q', entry]);
    expect(quiet.code).toBe(0);
    expect(quiet.stderr).toBe('');
  });

  it('compares against a reference bitstream', async () => {
    await run([entry]);
    const reference = join(work, 'reference.txt');
    await writeFile(reference, await readFile(join(work, 'main.bitstream.txt'), 'utf8'), 'utf8');

    const same = await run(['--compare', reference, entry]);
    expect(same.code).toBe(0);
    expect(same.stdout).toContain('result: match\n');

    await writeFile(reference, '0'.repeat(128), 'utf8');
    const different = await run(['--compare', reference, entry]);
    expect(different.code).toBe(1);
    expect(different.stdout).toContain('first difference: bit 0 in mask\n');
  });
});

describe('cli usage errors', () => {
  it('rejects unknown options with exit code 2', async () => {
    const res = await run(['--frob', 'main.json']);
    expect(res.code).toBe(2);
    expect(res.stderr.startsWith('dfbit: Unknown option "--frob"\n')).toBe(true);
  });

  it('requires a config path as the last argument', async () => {
    expect((await run([])).code).toBe(2);
    expect((await run(['a.json', '-q'])).code).toBe(2);
  });

  it('validates option values before compiling', async () => {
    const mask = await run(['--mask', '12', 'main.json']);
    expect(mask.code).toBe(2);
    expect(mask.stderr.startsWith('dfbit: --mask expects 8 binary digits (got "12")\n')).toBe(true);

    const strategy = await run(['--strategy', 'greedy', 'main.json']);
    expect(strategy.code).toBe(2);

    const iterations = await run(['--iterations', '0', 'main.json']);
    expect(iterations.stderr.startsWith('dfbit: --iterations must be >= 1 (got 0)\n')).toBe(true);
  });

  it('prints usage for --help', async () => {
    const res = await run(['--help']);
    expect(res.code).toBe(0);
    expect(res.stdout.startsWith('dfbit [options] <config.json>\n')).toBe(true);
  });

  it('prints the package version', async () => {
    const res = await run(['--version']);
    expect(res.code).toBe(0);
    expect(res.stdout).toBe('0.1.0\n');
  });
});
