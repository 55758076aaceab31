import type { ModulesArtifact, WriteTextOptions } from './types.js';
import { bitstreamLines } from './writeBitstream.js';

/**
 * Create the module dump: every non-empty module's bits back to back, in catalog order, with no
 * mask, enable bits or padding. Wrapped at 64 characters; the last line may be short.
 */
export function writeModules(modules: readonly string[], opts?: WriteTextOptions): ModulesArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const lines = bitstreamLines(modules.join(''));
  return { kind: 'modules', text: lines.length ? lines.join(lineEnding) + lineEnding : '' };
}
