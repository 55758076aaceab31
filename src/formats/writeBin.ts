import type { EmittedBitstream } from '../assembler/assemble.js';
import type { BinArtifact } from './types.js';

/**
 * Create a flat binary artifact from the assembled stream.
 *
 * Every 8 stream bits form one byte, first bit most significant. The stream is already
 * padded to whole 64-bit lines, so no partial byte remains.
 */
export function writeBin(stream: EmittedBitstream): BinArtifact {
  const out = new Uint8Array(Math.floor(stream.bits.length / 8));
  for (let i = 0; i < out.length; i++) {
    out[i] = Number.parseInt(stream.bits.slice(i * 8, i * 8 + 8), 2);
  }
  return { kind: 'bin', bytes: out };
}
