import type { EmittedBitstream } from './assembler/assemble.js';
import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters, PlacementReport } from './formats/types.js';
import type { PlacementOptions } from './placement/placer.js';

/**
 * Options that influence compilation behavior and which artifacts are produced.
 */
export interface CompilerOptions {
  /** Leading 8-bit enable mask, e.g. `11101110`. */
  configMask?: string;
  /** Placement strategy and search budgets. */
  placement?: PlacementOptions;
  /** Emit the text bitstream (`.bitstream.txt`). */
  emitBitstream?: boolean;
  /** Emit the stream as bytes (`.bin`). */
  emitBin?: boolean;
  /** Emit the grouped rendering (`.parsed.txt`). */
  emitParsed?: boolean;
  /** Emit the per-field dump (`.dump.txt`). Off by default. */
  emitDump?: boolean;
  /** Emit the unframed module bits (`.modules.txt`). Off by default. */
  emitModules?: boolean;
  /** Emit the placement summary (`.placement.txt`). Off by default. */
  emitPlacement?: boolean;
}

/**
 * Result of a compilation run: diagnostics plus any produced artifacts.
 *
 * `bitstream` and `placement` are present whenever assembly completed, whatever was emitted.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
  bitstream?: EmittedBitstream;
  placement?: PlacementReport;
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can be pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;
