import type { EmittedBitstream } from '../assembler/assemble.js';
import { KIND_LAYOUT } from '../assembler/kinds.js';
import type { ParsedArtifact, WriteTextOptions } from './types.js';

/**
 * Create the grouped rendering.
 *
 * Each kind gets a `kind:` header, then per entry either one `1 <chunk>` line per chunk or one
 * `0` line per chunk when the entry is empty, then a blank line. Every kind is listed, including
 * kinds whose mask group is off.
 */
export function writeParsed(stream: EmittedBitstream, opts?: WriteTextOptions): ParsedArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const lines: string[] = [];
  for (const layout of KIND_LAYOUT) {
    lines.push(`${layout.kind}:`);
    for (const section of stream.sections) {
      if (section.kind !== layout.kind) continue;
      if (section.empty) {
        for (let i = 0; i < layout.chunks; i++) lines.push('0');
      } else {
        for (const chunk of section.chunks) lines.push(`1 ${chunk}`);
      }
    }
    lines.push('');
  }
  return { kind: 'parsed', text: lines.join(lineEnding) + lineEnding };
}
