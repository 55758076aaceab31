import type { CompilationSession } from '../../session/session.js';
import type { CompositeModule, FieldSpec, LeafModule } from '../schema.js';
import { createComposite, createLeaf, referenceField } from '../schema.js';

export const ROW_LC_FIELDS: readonly FieldSpec[] = [
  referenceField('src_id', 3),
  { name: 'start', width: 2 },
  { name: 'stride', width: 2 },
  { name: 'end', width: 3 },
  { name: 'last_index', width: 2 },
];

export const COL_LC_FIELDS: readonly FieldSpec[] = [
  referenceField('src_id', 3),
  { name: 'start', width: 4 },
  { name: 'stride', width: 4 },
  { name: 'end', width: 6 },
  { name: 'last_index', width: 4 },
];

export interface GroupModule extends CompositeModule {
  row: LeafModule;
  col: LeafModule;
}

/**
 * Row/column loop pair. The group node holds a `row` slot; `<name>.ROW_LC` aliases it and
 * `<name>.COL_LC` takes its own `col` slot, fed by the row controller.
 */
export function createGroup(session: CompilationSession, name: string): GroupModule {
  const group = session.node(name, 'row');
  const rowNode = session.node(`${name}.ROW_LC`, 'row', group);
  const colNode = session.node(`${name}.COL_LC`, 'col');
  session.declareEdge(rowNode, colNode);

  const row = createLeaf(`groups.${name}.row_lc`, ROW_LC_FIELDS, rowNode);
  const col = createLeaf(`groups.${name}.col_lc`, COL_LC_FIELDS, colNode);
  const composite = createComposite(
    `groups.${name}`,
    [
      { key: 'row_lc', module: row },
      { key: 'col_lc', module: col },
    ],
    group,
  );
  return { ...composite, row, col };
}
