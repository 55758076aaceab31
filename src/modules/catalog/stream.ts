import type { CompilationSession } from '../../session/session.js';
import type { CompositeModule, FieldSpec } from '../schema.js';
import { createComposite, createLeaf, enumField, referenceField } from '../schema.js';

export type StreamDirection = 'read' | 'write';

export const STREAM_DATA_TYPES = { fp16: 0, fp32: 1, int8: 2, int32: 3 } as const;

/** Memory address generator, 360 bits. Per-dimension lists are `[d2, d1, d0]`. */
export const MEMORY_AG_FIELDS: readonly FieldSpec[] = [
  { name: 'mode', width: 1 },
  { name: 'base_addr', width: 29 },
  { name: 'idx_size', width: 24, elements: 3 },
  { name: 'dim_stride', width: 60, elements: 3 },
  { name: 'padding_reg_value', width: 8 },
  { name: 'idx_padding_low', width: 36, elements: 3 },
  { name: 'idx_padding_up', width: 36, elements: 3 },
  { name: 'idx_tailing_low', width: 36, elements: 3 },
  { name: 'idx_tailing_up', width: 36, elements: 3 },
  { name: 'address_remapping', width: 64, elements: 8 },
  { name: 'idx', width: 15, elements: 3 },
  { name: 'idx_enable', width: 3 },
  { name: 'idx_keep_mode', width: 3 },
  { name: 'idx_keep_last_index', width: 9, elements: 3 },
];

/** Buffer address generator, 101 bits. */
export const BUFFER_AG_FIELDS: readonly FieldSpec[] = [
  { name: 'spatial_stride', width: 80, elements: 4 },
  { name: 'spatial_size', width: 5 },
  { name: 'idx_enable', width: 2 },
  { name: 'idx_keep_mode', width: 2 },
  { name: 'idx_keep_last_index', width: 6, elements: 2 },
  { name: 'ping_buffer', width: 3 },
  { name: 'pong_buffer', width: 3 },
];

/** Stream control, 19 bits. */
export const STREAM_CONTROL_FIELDS: readonly FieldSpec[] = [
  referenceField('src_id', 4),
  { name: 'ping_pong', width: 1 },
  { name: 'pingpong_last_index', width: 3 },
  { name: 'buffer_depth', width: 8 },
  { name: 'reverse', width: 1 },
  enumField('data_type', 2, STREAM_DATA_TYPES),
];

const SECTION: Record<StreamDirection, string> = { read: 'read_streams', write: 'write_streams' };

/** Memory stream, 480 bits: memory AG, buffer AG, stream control. */
export function createStream(
  session: CompilationSession,
  name: string,
  direction: StreamDirection,
): CompositeModule {
  const identity = session.node(name, direction);
  const label = `${SECTION[direction]}.${name}`;
  return createComposite(
    label,
    [
      { key: 'memory_AG', module: createLeaf(`${label}.memory_AG`, MEMORY_AG_FIELDS, identity) },
      { key: 'buffer_AG', module: createLeaf(`${label}.buffer_AG`, BUFFER_AG_FIELDS, identity) },
      { key: 'stream', module: createLeaf(`${label}.stream`, STREAM_CONTROL_FIELDS, identity) },
    ],
    identity,
  );
}
