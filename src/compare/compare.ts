import type { EmittedBitstream } from '../assembler/assemble.js';
import { locateBit } from '../assembler/assemble.js';
import { MASK_BITS } from '../assembler/kinds.js';

/** Bits of context shown on each side of the first difference. */
const CONTEXT_BITS = 16;

export interface BitDifference {
  /** Stream bit offset. */
  bit: number;
  /** `mask`, `<kind>[<entry>]`, `padding`, or `end of stream`. */
  section: string;
  generated: string;
  reference: string;
}

/** First character of a reference that is not a binary digit. */
export interface InvalidCharacter {
  /** Offset after whitespace is removed. */
  offset: number;
  character: string;
}

export interface BitstreamComparison {
  match: boolean;
  generatedLength: number;
  referenceLength: number;
  maskMatch: boolean;
  firstDifference?: BitDifference;
  /** Set when the reference holds anything besides 0/1 and whitespace; never a match. */
  invalidCharacter?: InvalidCharacter;
}

/** Remove all whitespace from a text bitstream. */
export function normalizeBitstreamText(text: string): string {
  return text.replace(/\s+/g, '');
}

/**
 * Compare a generated stream with a reference text bitstream, whitespace ignored.
 */
export function compareBitstream(generated: EmittedBitstream, referenceText: string): BitstreamComparison {
  const ours = generated.bits;
  const theirs = normalizeBitstreamText(referenceText);
  const common = Math.min(ours.length, theirs.length);
  const invalid = theirs.search(/[^01]/);
  const result: BitstreamComparison = {
    match: invalid < 0 && ours === theirs,
    generatedLength: ours.length,
    referenceLength: theirs.length,
    maskMatch: ours.slice(0, MASK_BITS) === theirs.slice(0, MASK_BITS),
    ...(invalid >= 0 ? { invalidCharacter: { offset: invalid, character: theirs.charAt(invalid) } } : {}),
  };
  if (result.match) return result;

  let bit = 0;
  while (bit < common && ours[bit] === theirs[bit]) bit++;
  const from = Math.max(0, bit - CONTEXT_BITS);
  result.firstDifference = {
    bit,
    section: locateBit(generated, bit),
    generated: ours.slice(from, bit + CONTEXT_BITS),
    reference: theirs.slice(from, bit + CONTEXT_BITS),
  };
  return result;
}

export function formatComparison(report: BitstreamComparison): string {
  const lines = [
    `generated: ${report.generatedLength} bits`,
    `reference: ${report.referenceLength} bits`,
    `mask: ${report.maskMatch ? 'match' : 'differs'}`,
  ];
  if (report.match) {
    lines.push('result: match');
  } else {
    const d = report.firstDifference;
    lines.push('result: mismatch');
    const bad = report.invalidCharacter;
    if (bad) lines.push(`invalid character "${bad.character}" in reference at bit ${bad.offset}`);
    if (d) {
      lines.push(`first difference: bit ${d.bit} in ${d.section}`);
      lines.push(`  generated: ${d.generated}`);
      lines.push(`  reference: ${d.reference}`);
    }
  }
  return lines.join('\n') + '\n';
}
