import type { CompilationSession } from '../../session/session.js';
import type { FieldSpec, LeafModule } from '../schema.js';
import { createLeaf, referenceField } from '../schema.js';

/** Loop controller, 42 bits. */
export const LOOP_FIELDS: readonly FieldSpec[] = [
  referenceField('src_id', 3),
  { name: 'outmost_loop', width: 1 },
  { name: 'start', width: 12 },
  { name: 'stride', width: 10 },
  { name: 'end', width: 12 },
  { name: 'last_index', width: 4 },
];

export function createLoopController(session: CompilationSession, name: string): LeafModule {
  return createLeaf(`loops.${name}`, LOOP_FIELDS, session.node(name, 'loop'));
}
