/**
 * Bitstream module kinds in stream order.
 *
 * `chunks` is the number of enable-prefixed pieces a non-empty entry is split into;
 * `group` is the bit of the leading enable mask that switches the kind on.
 */
export interface KindLayout {
  kind: ModuleKind;
  entries: number;
  chunks: number;
  group: number;
}

export const ModuleKinds = [
  'iga_lc',
  'iga_row_lc',
  'iga_col_lc',
  'iga_pe',
  'se_rd_mse',
  'se_wr_mse',
  'se_nse',
  'buffer_manager_cluster',
  'special_array',
] as const;

export type ModuleKind = (typeof ModuleKinds)[number];

export const KIND_LAYOUT: readonly KindLayout[] = [
  { kind: 'iga_lc', entries: 8, chunks: 1, group: 0 },
  { kind: 'iga_row_lc', entries: 4, chunks: 1, group: 0 },
  { kind: 'iga_col_lc', entries: 4, chunks: 1, group: 0 },
  { kind: 'iga_pe', entries: 8, chunks: 1, group: 0 },
  { kind: 'se_rd_mse', entries: 3, chunks: 8, group: 1 },
  { kind: 'se_wr_mse', entries: 1, chunks: 6, group: 1 },
  { kind: 'se_nse', entries: 2, chunks: 1, group: 1 },
  { kind: 'buffer_manager_cluster', entries: 6, chunks: 1, group: 1 },
  { kind: 'special_array', entries: 1, chunks: 1, group: 2 },
];

export const MASK_BITS = 8;
export const DEFAULT_CONFIG_MASK = '11101110';

export function kindLayout(kind: ModuleKind): KindLayout {
  const layout = KIND_LAYOUT.find((k) => k.kind === kind);
  if (!layout) throw new Error(`Unknown module kind "${kind}"`);
  return layout;
}

/** True for an 8-character string of `0`/`1`. */
export function isConfigMask(text: string): boolean {
  return new RegExp(`^[01]{${MASK_BITS}}$`).test(text);
}

/** Group `g` is enabled when mask character `g` (leftmost = 0) is `1`. */
export function isGroupEnabled(mask: string, group: number): boolean {
  return mask.charAt(group) === '1';
}
