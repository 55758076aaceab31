import { LINE_BITS } from '../assembler/assemble.js';
import type { EmittedBitstream } from '../assembler/assemble.js';
import type { BitstreamArtifact, WriteTextOptions } from './types.js';

/** Split a padded stream into its 64-character lines. */
export function bitstreamLines(bits: string): string[] {
  const lines: string[] = [];
  for (let i = 0; i < bits.length; i += LINE_BITS) lines.push(bits.slice(i, i + LINE_BITS));
  return lines;
}

/**
 * Create the text bitstream artifact: one 64-bit line per row, trailing line ending included.
 */
export function writeBitstream(stream: EmittedBitstream, opts?: WriteTextOptions): BitstreamArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const lines = bitstreamLines(stream.bits);
  return { kind: 'bitstream', text: lines.join(lineEnding) + lineEnding };
}
