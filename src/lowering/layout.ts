import type { AssemblyEntry } from '../assembler/assemble.js';
import type { ModuleKind } from '../assembler/kinds.js';
import type { ModuleCatalog } from '../modules/catalog/index.js';
import type { ConfigModule } from '../modules/schema.js';
import { isModuleEmpty, moduleBits } from '../modules/schema.js';
import type { CompilationSession } from '../session/session.js';
import type { LogicalNode } from '../session/symbols.js';

function entryFor(
  kind: ModuleKind,
  index: number,
  module: ConfigModule,
  session: CompilationSession,
): AssemblyEntry {
  return {
    kind,
    index,
    bits: isModuleEmpty(module) ? undefined : moduleBits(module, session),
    label: module.label,
  };
}

function placedAt(node: LogicalNode | undefined, session: CompilationSession, label: string): number {
  if (!node) throw new Error(`Module "${label}" has no identity node`);
  return session.slotOf(node).index;
}

/**
 * Map catalog modules onto assembler entries by their frozen slots.
 *
 * Placed kinds take the entry index of their module's slot; the neighbor stream, buffers and
 * special array have fixed entries. Forces placement resolution.
 */
export function buildAssemblyEntries(
  catalog: ModuleCatalog,
  session: CompilationSession,
): AssemblyEntry[] {
  const placed = (kind: ModuleKind, modules: readonly ConfigModule[]): AssemblyEntry[] =>
    modules.map((m) => entryFor(kind, placedAt(m.identity, session, m.label), m, session));

  return [
    ...placed('iga_lc', catalog.loops),
    ...placed('iga_row_lc', catalog.groups.map((g) => g.row)),
    ...placed('iga_col_lc', catalog.groups.map((g) => g.col)),
    ...placed('iga_pe', catalog.pes),
    ...placed('se_rd_mse', catalog.readStreams),
    ...placed('se_wr_mse', catalog.writeStreams),
    entryFor('se_nse', 0, catalog.neighbor, session),
    ...catalog.buffers.map((b, i) => entryFor('buffer_manager_cluster', i, b, session)),
    entryFor('special_array', 0, catalog.special, session),
  ];
}
