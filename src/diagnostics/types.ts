/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A compiler diagnostic (error/warning/info) attributed to the configuration file being compiled.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `DFB001`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** Dotted path of the configuration entry the diagnostic refers to, when known. */
  path?: string;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /**
   * Unknown/unclassified diagnostic.
   *
   * Use a more specific ID when possible; this remains for forward compatibility.
   */
  Unknown: 'DFB000',

  /** Failed to read a configuration or reference file from disk. */
  IoReadFailed: 'DFB001',

  /** Configuration text is not valid JSON. */
  ConfigParseError: 'DFB002',

  /** Invalid compiler option (config mask, placement strategy, etc.). */
  OptionError: 'DFB003',

  /** Configuration document or one of its sections has the wrong shape. */
  ConfigShapeError: 'DFB100',

  /** A reference field names a node that no module declares. */
  UnknownNodeReference: 'DFB101',

  /** A reference connects two resource classes that have no adjacency rule. */
  UnsupportedConnection: 'DFB102',

  /** More logical nodes of a class than physical slots in its pool. */
  PoolExhausted: 'DFB200',

  /** Final placement leaves an edge outside its adjacency window. */
  PlacementViolation: 'DFB201',

  /** Exact placement search ran out of time before completing. */
  PlacementTimeout: 'DFB202',

  /** A resolved reference lies outside its rule window and was encoded as index 0. */
  RelativeIndexOutOfRange: 'DFB300',

  /** Internal error while encoding or assembling (schema/width violation). */
  EncodeError: 'DFB301',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

/**
 * True when any diagnostic in the list is an error.
 */
export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
