import { describe, expect, it } from 'vitest';

import { assembleBitstream } from '../src/assembler/assemble.js';
import { DEFAULT_CONFIG_MASK } from '../src/assembler/kinds.js';
import { compareBitstream, formatComparison, normalizeBitstreamText } from '../src/compare/compare.js';
import { writeBitstream } from '../src/formats/writeBitstream.js';

const stream = assembleBitstream([], DEFAULT_CONFIG_MASK);

function flip(bits: string, at: number): string {
  return bits.slice(0, at) + (bits[at] === '1' ? '0' : '1') + bits.slice(at + 1);
}

describe('compareBitstream', () => {
  it('matches its own text rendering', () => {
    const report = compareBitstream(stream, writeBitstream(stream).text);
    expect(report).toEqual({
      match: true,
      generatedLength: 128,
      referenceLength: 128,
      maskMatch: true,
    });
  });

  it('ignores whitespace in the reference', () => {
    expect(normalizeBitstreamText(' 1110\n1110 \r\n00')).toBe('1110111000');
    const spaced = stream.bits.replace(/(.{16})/g, '$1 \n');
    expect(compareBitstream(stream, spaced).match).toBe(true);
  });

  it('rejects characters other than binary digits', () => {
    const reference = `${stream.bits.slice(0, 20)}x${stream.bits.slice(21)}`;
    const report = compareBitstream(stream, reference);
    expect(report.match).toBe(false);
    expect(report.invalidCharacter).toEqual({ offset: 20, character: 'x' });
    expect(report.firstDifference).toMatchObject({ bit: 20, section: 'iga_col_lc[0]' });

    const spaced = compareBitstream(stream, `${stream.bits.slice(0, 8)} 2\n`);
    expect(spaced.invalidCharacter).toEqual({ offset: 8, character: '2' });
    expect(spaced.maskMatch).toBe(true);
  });

  it('locates the first difference inside a section', () => {
    const report = compareBitstream(stream, flip(stream.bits, 20));
    expect(report.match).toBe(false);
    expect(report.maskMatch).toBe(true);
    expect(report.firstDifference).toMatchObject({ bit: 20, section: 'iga_col_lc[0]' });
  });

  it('flags a differing mask', () => {
    const report = compareBitstream(stream, flip(stream.bits, 0));
    expect(report.maskMatch).toBe(false);
    expect(report.firstDifference?.section).toBe('mask');
  });

  it('reports a shorter reference at the point it ends', () => {
    const report = compareBitstream(stream, stream.bits.slice(0, 64));
    expect(report.referenceLength).toBe(64);
    expect(report.firstDifference).toMatchObject({ bit: 64, section: 'se_wr_mse[0]' });
  });
});

describe('formatComparison', () => {
  it('renders a match', () => {
    const report = compareBitstream(stream, stream.bits);
    expect(formatComparison(report)).toBe(
      'generated: 128 bits\nreference: 128 bits\nmask: match\nresult: match\n',
    );
  });

  it('renders the first difference with context', () => {
    const report = compareBitstream(stream, flip(stream.bits, 20));
    expect(formatComparison(report)).toBe(
      [
        'generated: 128 bits',
        'reference: 128 bits',
        'mask: match',
        'result: mismatch',
        'first difference: bit 20 in iga_col_lc[0]',
        `  generated: 1110${'0'.repeat(28)}`,
        `  reference: 1110${'0'.repeat(12)}1${'0'.repeat(15)}`,
        '',
      ].join('\n'),
    );
  });

  it('names an invalid reference character', () => {
    const report = compareBitstream(stream, `${stream.bits.slice(0, 127)}?`);
    expect(formatComparison(report).split('\n').slice(0, 6)).toEqual([
      'generated: 128 bits',
      'reference: 128 bits',
      'mask: match',
      'result: mismatch',
      'invalid character "?" in reference at bit 127',
      'first difference: bit 127 in padding',
    ]);
  });
});
