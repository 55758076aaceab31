import type { JsonValue } from '../../frontend/document.js';
import type { FieldSpec, FieldValue, LeafModule } from '../schema.js';
import { createLeaf } from '../schema.js';

const flag = (on: boolean): FieldValue => ({ kind: 'int', value: on ? 1n : 0n });

/** Special array, 23 bits. */
export const SPECIAL_FIELDS: readonly FieldSpec[] = [
  { name: 'data_type', width: 2, transform: { kind: 'map', apply: (raw) => flag(raw !== 'fp16') } },
  { name: 'index_end', width: 3 },
  { name: 'inport0_enable', width: 1 },
  { name: 'inport1_enable', width: 1 },
  { name: 'inport2_enable', width: 1 },
  { name: 'inport0_src_id', width: 4 },
  { name: 'inport1_src_id', width: 4 },
  { name: 'inport2_src_id', width: 4 },
  { name: 'outport_enable', width: 1 },
  { name: 'outport_mode', width: 1, transform: { kind: 'map', apply: (raw) => flag(raw !== 'col') } },
  {
    name: 'outport_fp32to16',
    width: 1,
    transform: { kind: 'map', apply: (raw: JsonValue) => flag(String(raw).toLowerCase() === 'true') },
  },
];

export function createSpecialArray(): LeafModule {
  return createLeaf('special_array', SPECIAL_FIELDS);
}
