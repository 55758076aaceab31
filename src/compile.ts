import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { assembleBitstream } from './assembler/assemble.js';
import { DEFAULT_CONFIG_MASK, isConfigMask } from './assembler/kinds.js';
import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import type { Artifact } from './formats/types.js';
import { isJsonObject, parseConfigText } from './frontend/document.js';
import { buildAssemblyEntries } from './lowering/layout.js';
import { buildCatalog, populateCatalog } from './modules/catalog/index.js';
import { dumpModule, isModuleEmpty, moduleBits } from './modules/schema.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';
import { PlacementStrategies } from './placement/placer.js';
import { PoolExhaustedError } from './placement/resources.js';
import { validateReferences } from './semantics/references.js';
import { placementReport } from './session/report.js';
import { CompilationSession } from './session/session.js';

function withDefaults(
  options: CompilerOptions,
): Required<
  Pick<
    CompilerOptions,
    'emitBitstream' | 'emitBin' | 'emitParsed' | 'emitDump' | 'emitModules' | 'emitPlacement'
  >
> {
  const anyPrimaryEmitSpecified = [options.emitBitstream, options.emitBin, options.emitParsed].some(
    (v) => v !== undefined,
  );

  const emitBitstream = anyPrimaryEmitSpecified ? (options.emitBitstream ?? false) : true;
  const emitBin = anyPrimaryEmitSpecified ? (options.emitBin ?? false) : true;
  const emitParsed = anyPrimaryEmitSpecified ? (options.emitParsed ?? false) : true;

  // Sidecars are opt-in.
  const emitDump = options.emitDump ?? false;
  const emitModules = options.emitModules ?? false;
  const emitPlacement = options.emitPlacement ?? false;

  return { emitBitstream, emitBin, emitParsed, emitDump, emitModules, emitPlacement };
}

function isCount(value: number | undefined, min: number): boolean {
  return value === undefined || (Number.isInteger(value) && value >= min);
}

/** Validate options; returns the effective config mask, or `undefined` after reporting errors. */
function checkOptions(options: CompilerOptions, file: string, diagnostics: Diagnostic[]): string | undefined {
  const report = (message: string): void => {
    diagnostics.push({ id: DiagnosticIds.OptionError, severity: 'error', message, file });
  };
  const mask = options.configMask ?? DEFAULT_CONFIG_MASK;
  if (!isConfigMask(mask)) report(`Config mask must be 8 binary digits (got "${mask}").`);

  const p = options.placement ?? {};
  if (p.strategy !== undefined && !PlacementStrategies.includes(p.strategy)) {
    report(`Unknown placement strategy "${p.strategy}".`);
  }
  if (!isCount(p.iterations, 1)) report('Placement iterations must be a positive integer.');
  if (!isCount(p.restarts, 1)) report('Placement restarts must be a positive integer.');
  if (p.seed !== undefined && !Number.isInteger(p.seed)) report('Placement seed must be an integer.');
  if (p.timeoutMs !== undefined && !(p.timeoutMs >= 0)) {
    report('Placement timeout must be a non-negative number of milliseconds.');
  }
  return hasErrors(diagnostics) ? undefined : mask;
}

/**
 * Compile an already-parsed configuration document, entirely in memory.
 *
 * Steps: build the module catalog (declaring every node), populate it (recording edges),
 * validate references, freeze placement, assemble, then produce the requested artifacts.
 * Codec errors that escape a step become an `EncodeError` diagnostic.
 */
export function compileDocument(
  document: unknown,
  options: CompilerOptions,
  deps: PipelineDeps,
  file = '<memory>',
): CompileResult {
  const diagnostics: Diagnostic[] = [];
  const mask = checkOptions(options, file, diagnostics);
  if (mask === undefined) return { diagnostics, artifacts: [] };
  if (!isJsonObject(document)) {
    diagnostics.push({
      id: DiagnosticIds.ConfigShapeError,
      severity: 'error',
      message: 'Configuration must be a JSON object at the top level.',
      file,
    });
    return { diagnostics, artifacts: [] };
  }

  const session = new CompilationSession({
    file,
    diagnostics,
    ...(options.placement ? { placement: options.placement } : {}),
  });

  try {
    const catalog = buildCatalog(document, session, diagnostics);
    populateCatalog(catalog, session);
    if (hasErrors(diagnostics)) return { diagnostics, artifacts: [] };

    validateReferences(session, diagnostics);
    if (hasErrors(diagnostics)) return { diagnostics, artifacts: [] };

    session.resolveAll();
    const bitstream = assembleBitstream(buildAssemblyEntries(catalog, session), mask);
    const placement = placementReport(session);

    const emit = withDefaults(options);
    const artifacts: Artifact[] = [];
    if (emit.emitBitstream) artifacts.push(deps.formats.writeBitstream(bitstream));
    if (emit.emitBin) artifacts.push(deps.formats.writeBin(bitstream));
    if (emit.emitParsed) artifacts.push(deps.formats.writeParsed(bitstream));
    if (emit.emitDump) {
      if (deps.formats.writeDump) {
        const fields = catalog.entries.flatMap((e) => dumpModule(e.module, session));
        artifacts.push(deps.formats.writeDump(fields));
      } else {
        diagnostics.push({
          id: DiagnosticIds.Unknown,
          severity: 'warning',
          message: 'emitDump=true but no dump writer is configured; skipping dump artifact.',
          file,
        });
      }
    }
    if (emit.emitModules) {
      if (deps.formats.writeModules) {
        const modules = catalog.entries
          .filter((e) => !isModuleEmpty(e.module))
          .map((e) => moduleBits(e.module, session));
        artifacts.push(deps.formats.writeModules(modules));
      } else {
        diagnostics.push({
          id: DiagnosticIds.Unknown,
          severity: 'warning',
          message: 'emitModules=true but no modules writer is configured; skipping modules artifact.',
          file,
        });
      }
    }
    if (emit.emitPlacement) {
      if (deps.formats.writePlacement) {
        artifacts.push(deps.formats.writePlacement(placement));
      } else {
        diagnostics.push({
          id: DiagnosticIds.Unknown,
          severity: 'warning',
          message: 'emitPlacement=true but no placement writer is configured; skipping placement artifact.',
          file,
        });
      }
    }
    return { diagnostics, artifacts, bitstream, placement };
  } catch (err) {
    if (err instanceof PoolExhaustedError) {
      diagnostics.push({
        id: DiagnosticIds.PoolExhausted,
        severity: 'error',
        message: err.message,
        file,
      });
    } else {
      diagnostics.push({
        id: DiagnosticIds.EncodeError,
        severity: 'error',
        message: `Internal error during encoding: ${err instanceof Error ? err.message : String(err)}`,
        file,
      });
    }
    return { diagnostics, artifacts: [] };
  }
}

/**
 * Compile a JSON configuration file.
 *
 * Reads and parses the file, then runs {@link compileDocument}. Produces artifacts in memory via
 * `deps.formats`; nothing is written to disk.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  const entryPath = resolve(entryFile);
  const diagnostics: Diagnostic[] = [];

  let text: string;
  try {
    text = await readFile(entryPath, 'utf8');
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to read config file: ${String(err)}`,
      file: entryPath,
    });
    return { diagnostics, artifacts: [] };
  }

  const document = parseConfigText(text, entryPath, diagnostics);
  if (!document) return { diagnostics, artifacts: [] };
  return compileDocument(document, options, deps, entryPath);
};
