import type { ModuleKind } from './kinds.js';
import { KIND_LAYOUT, MASK_BITS, isConfigMask, isGroupEnabled } from './kinds.js';

export const LINE_BITS = 64;

/**
 * Encoded content of one entry slot. `bits` is `undefined` for an empty entry.
 */
export interface AssemblyEntry {
  kind: ModuleKind;
  index: number;
  bits: string | undefined;
  /** Module that filled the entry, for renderings. */
  label?: string;
}

/**
 * Position of one entry in the assembled stream.
 *
 * Entries of a disabled group are kept with `enabled: false` and `length: 0`.
 */
export interface AssembledSection {
  kind: ModuleKind;
  index: number;
  label: string | undefined;
  enabled: boolean;
  empty: boolean;
  offset: number;
  length: number;
  /** Chunk payloads without their enable bit; empty for an empty entry. */
  chunks: string[];
}

export interface EmittedBitstream {
  mask: string;
  /** Full stream: mask, sections, zero padding. */
  bits: string;
  sections: AssembledSection[];
  /** Offset where padding starts. */
  payloadLength: number;
}

/** Split `bits` into `count` equal chunks. */
export function splitChunks(bits: string, count: number): string[] {
  if (count < 1 || bits.length % count !== 0) {
    throw new RangeError(`${bits.length} bits do not split into ${count} equal chunks`);
  }
  const size = bits.length / count;
  return Array.from({ length: count }, (_, i) => bits.slice(i * size, (i + 1) * size));
}

/**
 * Assemble the bitstream.
 *
 * For every kind (stream order) and entry index: an entry without bits, or with only zero
 * bits, emits one `0` per chunk; otherwise each chunk is emitted as `1` followed by the chunk.
 * Kinds of a disabled mask group emit nothing. The stream is zero-padded to a multiple of
 * 64 bits.
 */
export function assembleBitstream(entries: readonly AssemblyEntry[], mask: string): EmittedBitstream {
  if (!isConfigMask(mask)) {
    throw new RangeError(`Config mask must be ${MASK_BITS} binary digits (got "${mask}")`);
  }
  const parts: string[] = [mask];
  let offset = MASK_BITS;
  const sections: AssembledSection[] = [];

  for (const layout of KIND_LAYOUT) {
    const enabled = isGroupEnabled(mask, layout.group);
    for (let index = 0; index < layout.entries; index++) {
      const entry = entries.find((e) => e.kind === layout.kind && e.index === index);
      const bits = entry?.bits;
      const chunks =
        bits === undefined || !bits.includes('1') ? [] : splitChunks(bits, layout.chunks);
      const empty = chunks.length === 0;
      const text = empty ? '0'.repeat(layout.chunks) : chunks.map((c) => `1${c}`).join('');
      const length = enabled ? text.length : 0;
      sections.push({
        kind: layout.kind,
        index,
        label: entry?.label,
        enabled,
        empty,
        offset,
        length,
        chunks,
      });
      if (enabled) {
        parts.push(text);
        offset += length;
      }
    }
  }

  const payload = parts.join('');
  const padding = (LINE_BITS - (payload.length % LINE_BITS)) % LINE_BITS;
  return {
    mask,
    bits: payload + '0'.repeat(padding),
    sections,
    payloadLength: payload.length,
  };
}

/** Section containing stream bit `bit`, or the region name outside any section. */
export function locateBit(stream: EmittedBitstream, bit: number): string {
  if (bit < MASK_BITS) return 'mask';
  const section = stream.sections.find(
    (s) => s.enabled && bit >= s.offset && bit < s.offset + s.length,
  );
  if (section) return `${section.kind}[${section.index}]`;
  return bit < stream.bits.length ? 'padding' : 'end of stream';
}
