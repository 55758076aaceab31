import type { FieldSpec, LeafModule } from '../schema.js';
import { createLeaf } from '../schema.js';

export const NEIGHBOR_FIELDS: readonly FieldSpec[] = [
  { name: 'mem_loop', width: 4 },
  { name: 'mode', width: 1 },
  { name: 'stream_id', width: 2 },
  { name: 'src_slice_sel', width: 1 },
  { name: 'dst_slice_sel', width: 1 },
  { name: 'src_buf_idx', width: 3 },
  { name: 'dst_buf_idx', width: 3 },
];

export function createNeighborStream(): LeafModule {
  return createLeaf('neighbor', NEIGHBOR_FIELDS);
}
