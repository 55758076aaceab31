import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { findRule } from '../placement/rules.js';
import type { CompilationSession } from '../session/session.js';
import { rootNode } from '../session/symbols.js';

/**
 * Check every recorded connection before placement.
 *
 * - A source name no module declared is an `UnknownNodeReference` error.
 * - A class pair without an addressing rule is an `UnsupportedConnection` error.
 *
 * Each missing name is reported once.
 */
export function validateReferences(session: CompilationSession, diagnostics: Diagnostic[]): void {
  const unknown = new Set<string>();
  for (const { source, destination } of session.graph.all()) {
    if (!source.declared) {
      if (unknown.has(source.name)) continue;
      unknown.add(source.name);
      diagnostics.push({
        id: DiagnosticIds.UnknownNodeReference,
        severity: 'error',
        message: `${destination.name} references unknown node "${source.name}".`,
        file: session.file,
      });
      continue;
    }
    const s = rootNode(source).resourceClass;
    const d = rootNode(destination).resourceClass;
    if (!findRule(s, d)) {
      diagnostics.push({
        id: DiagnosticIds.UnsupportedConnection,
        severity: 'error',
        message: `${destination.name} (${d ?? 'unclassified'}) cannot read from ${source.name} (${s ?? 'unclassified'}).`,
        file: session.file,
      });
    }
  }
}
