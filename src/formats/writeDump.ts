import type { FieldDump } from '../modules/schema.js';
import type { DumpArtifact, WriteTextOptions } from './types.js';

export function writeDump(fields: readonly FieldDump[], opts?: WriteTextOptions): DumpArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const lines: string[] = [];
  let current: string | undefined;
  for (const f of fields) {
    if (f.module !== current) {
      if (current !== undefined) lines.push('');
      lines.push(`${f.module}:`);
      current = f.module;
    }
    lines.push(`  ${f.field.padEnd(22)} ${f.raw.padEnd(16)} 0b${f.binary} 0x${f.hex}`);
  }
  return { kind: 'dump', text: lines.length ? lines.join(lineEnding) + lineEnding : '' };
}
