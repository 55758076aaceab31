import type { JsonValue } from '../../frontend/document.js';
import { isJsonObject } from '../../frontend/document.js';
import type { FieldSpec, FieldValue, LeafModule } from '../schema.js';
import { createLeaf, valueFromRaw } from '../schema.js';

export const BUFFER_COUNT = 6;

function lifeTime(raw: JsonValue): FieldValue {
  const value = valueFromRaw(raw, 'buffer_life_time');
  return value.kind === 'int' ? { kind: 'int', value: value.value - 1n } : value;
}

/** Buffer manager entry, 12 bits. `buffer_life_time` is stored minus one. */
export const BUFFER_FIELDS: readonly FieldSpec[] = [
  { name: 'dst_port', width: 1 },
  { name: 'buffer_life_time', width: 2, transform: { kind: 'map', apply: lifeTime } },
  { name: 'mode', width: 1 },
  { name: 'mask', width: 8 },
];

export function createBuffer(index: number): LeafModule {
  return createLeaf(`buffers.buffer${index}`, BUFFER_FIELDS);
}

/** `enable: 0` (or `false`) switches a buffer entry off regardless of its other fields. */
export function isBufferDisabled(input: JsonValue | undefined): boolean {
  return isJsonObject(input) && (input['enable'] === 0 || input['enable'] === false);
}
