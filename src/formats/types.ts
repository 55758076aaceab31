import type { EmittedBitstream } from '../assembler/assemble.js';
import type { FieldDump } from '../modules/schema.js';

/**
 * Options shared by text writers.
 */
export interface WriteTextOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * One node of the frozen placement, as reported.
 */
export interface PlacedNodeReport {
  name: string;
  slot: string;
  /** Node whose slot an alias shares. */
  aliasOf?: string;
}

/**
 * One recorded connection with its placement penalty.
 *
 * `penalty` and `relativeIndex` are `undefined` when the class pair has no rule.
 */
export interface ConnectionReport {
  source: string;
  destination: string;
  sourceSlot: string;
  destinationSlot: string;
  penalty: number | undefined;
  relativeIndex: number | undefined;
}

export interface PlacementReport {
  strategy: string;
  cost: number;
  nodes: PlacedNodeReport[];
  edges: ConnectionReport[];
}

/**
 * 64-bit text lines of the assembled stream.
 */
export interface BitstreamArtifact {
  kind: 'bitstream';
  path?: string;
  text: string;
}

/**
 * The assembled stream as bytes, most significant bit first.
 */
export interface BinArtifact {
  kind: 'bin';
  path?: string;
  bytes: Uint8Array;
}

/**
 * Per-kind grouped rendering of the stream.
 */
export interface ParsedArtifact {
  kind: 'parsed';
  path?: string;
  text: string;
}

/**
 * Per-field dump of every non-empty module.
 */
export interface DumpArtifact {
  kind: 'dump';
  path?: string;
  text: string;
}

/**
 * Unframed concatenation of the non-empty modules' bits.
 */
export interface ModulesArtifact {
  kind: 'modules';
  path?: string;
  text: string;
}

/**
 * Placement and connection summary.
 */
export interface PlacementArtifact {
  kind: 'placement';
  path?: string;
  text: string;
}

/**
 * Union of all artifact kinds produced by the compiler.
 */
export type Artifact =
  | BitstreamArtifact
  | BinArtifact
  | ParsedArtifact
  | DumpArtifact
  | ModulesArtifact
  | PlacementArtifact;

/**
 * Format writers used by the pipeline to turn the assembled stream into artifacts.
 */
export interface FormatWriters {
  writeBitstream(stream: EmittedBitstream, opts?: WriteTextOptions): BitstreamArtifact;
  writeBin(stream: EmittedBitstream): BinArtifact;
  writeParsed(stream: EmittedBitstream, opts?: WriteTextOptions): ParsedArtifact;
  writeDump?(fields: readonly FieldDump[], opts?: WriteTextOptions): DumpArtifact;
  writeModules?(modules: readonly string[], opts?: WriteTextOptions): ModulesArtifact;
  writePlacement?(report: PlacementReport, opts?: WriteTextOptions): PlacementArtifact;
}
