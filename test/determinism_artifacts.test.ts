import { describe, expect, it } from 'vitest';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

import { compile } from '../src/compile.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import type { Artifact } from '../src/formats/types.js';
import type { CompilerOptions } from '../src/pipeline.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function artifactText(a: Artifact): { kind: string; data: string } {
  switch (a.kind) {
    case 'bin':
      return { kind: 'bin', data: Buffer.from(a.bytes).toString('hex') };
    case 'bitstream':
    case 'parsed':
    case 'dump':
    case 'modules':
    case 'placement':
      return { kind: a.kind, data: a.text };
  }
}

describe('determinism', () => {
  const entry = join(__dirname, 'fixtures', 'pipeline.json');
  const options: CompilerOptions = { emitDump: true, emitPlacement: true };

  it('produces identical artifacts across runs', async () => {
    const first = await compile(entry, options, { formats: defaultFormatWriters });
    const second = await compile(entry, options, { formats: defaultFormatWriters });

    expect(first.diagnostics).toEqual([]);
    expect(second.diagnostics).toEqual([]);
    expect(first.artifacts.map(artifactText)).toEqual(second.artifacts.map(artifactText));
    expect(first.artifacts.map((a) => a.kind)).toEqual(['bitstream', 'bin', 'parsed', 'dump', 'placement']);
  });

  it('places the fixture without penalties', async () => {
    const res = await compile(entry, options, { formats: defaultFormatWriters });
    expect(res.placement?.cost).toBe(0);
    expect(res.placement?.strategy).toBe('exact');
    expect(res.placement?.edges.every((e) => e.penalty === 0)).toBe(true);
  });

  it('is stable under the heuristic strategy with a fixed seed', async () => {
    const heuristic: CompilerOptions = { placement: { strategy: 'heuristic', seed: 11, restarts: 2 } };
    const a = await compile(entry, heuristic, { formats: defaultFormatWriters });
    const b = await compile(entry, heuristic, { formats: defaultFormatWriters });
    expect(a.bitstream?.bits).toBe(b.bitstream?.bits);
    expect(a.placement).toEqual(b.placement);
  });
});
