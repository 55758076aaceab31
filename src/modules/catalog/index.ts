import type { Diagnostic } from '../../diagnostics/types.js';
import { DiagnosticIds } from '../../diagnostics/types.js';
import type { JsonObject, JsonValue } from '../../frontend/document.js';
import { isJsonObject, sectionEntries } from '../../frontend/document.js';
import type { CompilationSession } from '../../session/session.js';
import { SymbolConflictError } from '../../session/symbols.js';
import type { CompositeModule, ConfigModule, LeafModule } from '../schema.js';
import { markEmpty, populateModule } from '../schema.js';
import { BUFFER_COUNT, createBuffer, isBufferDisabled } from './buffer.js';
import type { GroupModule } from './group.js';
import { createGroup } from './group.js';
import { createLoopController } from './loop.js';
import { createNeighborStream } from './neighbor.js';
import { createProcessingElement } from './pe.js';
import { createSpecialArray } from './special.js';
import { createStream } from './stream.js';

export interface CatalogEntry {
  module: ConfigModule;
  input: JsonValue | undefined;
}

/**
 * Every module built from one configuration document.
 */
export interface ModuleCatalog {
  loops: LeafModule[];
  groups: GroupModule[];
  pes: CompositeModule[];
  readStreams: CompositeModule[];
  writeStreams: CompositeModule[];
  neighbor: LeafModule;
  buffers: LeafModule[];
  special: LeafModule;
  /** Modules in document order with the input each one reads. */
  entries: CatalogEntry[];
}

/**
 * Build the catalog and declare every module identity on the session.
 *
 * Nothing is populated yet, so every name a reference may use exists before any
 * reference is bound. Name clashes between sections are reported as errors.
 */
export function buildCatalog(
  document: JsonObject,
  session: CompilationSession,
  diagnostics: Diagnostic[],
): ModuleCatalog {
  const file = session.file;
  const entries: CatalogEntry[] = [];

  const named = <M extends ConfigModule>(
    section: string,
    create: (name: string) => M,
  ): M[] => {
    const out: M[] = [];
    for (const [name, input] of sectionEntries(document, section, file, diagnostics)) {
      try {
        const module = create(name);
        out.push(module);
        entries.push({ module, input });
      } catch (err) {
        if (!(err instanceof SymbolConflictError)) throw err;
        diagnostics.push({
          id: DiagnosticIds.ConfigShapeError,
          severity: 'error',
          message: err.message,
          file,
          path: `${section}.${name}`,
        });
      }
    }
    return out;
  };

  const loops = named('loops', (name) => createLoopController(session, name));
  const groups = named('groups', (name) => createGroup(session, name));
  const pes = named('pes', (name) => createProcessingElement(session, name));
  const readStreams = named('read_streams', (name) => createStream(session, name, 'read'));
  const writeStreams = named('write_streams', (name) => createStream(session, name, 'write'));

  const neighbor = createNeighborStream();
  entries.push({ module: neighbor, input: document['neighbor'] });

  const bufferSection = document['buffers'];
  if (bufferSection !== undefined && bufferSection !== null && !isJsonObject(bufferSection)) {
    diagnostics.push({
      id: DiagnosticIds.ConfigShapeError,
      severity: 'error',
      message: 'Section "buffers" must be an object keyed buffer0..buffer5.',
      file,
      path: 'buffers',
    });
  }
  const buffers: LeafModule[] = [];
  for (let i = 0; i < BUFFER_COUNT; i++) {
    const module = createBuffer(i);
    buffers.push(module);
    entries.push({
      module,
      input: isJsonObject(bufferSection) ? bufferSection[`buffer${i}`] : undefined,
    });
  }

  const special = createSpecialArray();
  entries.push({ module: special, input: document['special_array'] });

  return { loops, groups, pes, readStreams, writeStreams, neighbor, buffers, special, entries };
}

/** Populate every module from its input; disabled buffers are then marked empty. */
export function populateCatalog(catalog: ModuleCatalog, session: CompilationSession): void {
  for (const { module, input } of catalog.entries) {
    populateModule(module, input, session);
    if (catalog.buffers.some((b) => b === module) && isBufferDisabled(input)) markEmpty(module);
  }
}
