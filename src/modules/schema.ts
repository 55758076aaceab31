import { BitVector } from '../bits/bitvector.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { JsonValue } from '../frontend/document.js';
import { isJsonObject } from '../frontend/document.js';
import type { CompilationSession } from '../session/session.js';
import type { LogicalNode, NodeReference } from '../session/symbols.js';

/** Widest chunk a list-valued field is split into. */
export const LIST_CHUNK_BITS = 64;

/**
 * Decoded value of a field, ready for encoding.
 */
export type FieldValue =
  | { kind: 'absent' }
  | { kind: 'int'; value: bigint }
  | { kind: 'bits'; bits: BitVector }
  | NodeReference
  | { kind: 'list'; items: FieldValue[] };

/**
 * Conversion from the raw configuration value.
 *
 * - `map` runs when the field is encoded.
 * - `bind` runs once, when the module is populated, and may record edges on the session.
 */
export type FieldTransform =
  | { kind: 'map'; apply: (raw: JsonValue) => FieldValue }
  | {
      kind: 'bind';
      apply: (raw: JsonValue, module: LeafModule, session: CompilationSession) => FieldValue;
    };

export interface FieldSpec {
  name: string;
  width: number;
  transform?: FieldTransform;
  /** Element count for packed list values; defaults to the list's length. */
  elements?: number;
}

interface StoredField {
  raw: JsonValue;
  bound?: FieldValue;
}

interface ModuleBase {
  label: string;
  /** Node whose placement and references this module speaks for. */
  identity: LogicalNode | undefined;
  populated: boolean;
  markedEmpty: boolean;
}

/** A module with its own ordered field schema. */
export interface LeafModule extends ModuleBase {
  kind: 'leaf';
  schema: readonly FieldSpec[];
  values: Map<string, StoredField>;
}

export interface ModuleChild {
  /** Input key the child reads; `undefined` means the parent's own object. */
  key: string | undefined;
  module: ConfigModule;
}

/** A module that concatenates its children's encodings, in order. */
export interface CompositeModule extends ModuleBase {
  kind: 'composite';
  children: readonly ModuleChild[];
}

export type ConfigModule = LeafModule | CompositeModule;

export interface FieldDump {
  module: string;
  field: string;
  raw: string;
  binary: string;
  hex: string;
}

export function createLeaf(
  label: string,
  schema: readonly FieldSpec[],
  identity?: LogicalNode,
): LeafModule {
  return { kind: 'leaf', label, identity, schema, values: new Map(), populated: false, markedEmpty: false };
}

export function createComposite(
  label: string,
  children: readonly ModuleChild[],
  identity?: LogicalNode,
): CompositeModule {
  return { kind: 'composite', label, identity, children, populated: false, markedEmpty: false };
}

/** Declared bit width of a module. */
export function moduleWidth(module: ConfigModule): number {
  if (module.kind === 'leaf') return module.schema.reduce((sum, f) => sum + f.width, 0);
  return module.children.reduce((sum, c) => sum + moduleWidth(c.module), 0);
}

/**
 * Store raw input values into a module (and its children), once.
 *
 * Absent input marks the module empty. Keys outside the schema are ignored. `bind`
 * transforms run here, so every reference edge exists before placement.
 */
export function populateModule(
  module: ConfigModule,
  input: JsonValue | undefined,
  session: CompilationSession,
  path = module.label,
): void {
  if (module.populated) throw new Error(`Module "${module.label}" is already populated`);
  module.populated = true;
  if (input === undefined || input === null) {
    markEmpty(module);
    return;
  }
  if (!isJsonObject(input)) {
    session.diagnostics.push({
      id: DiagnosticIds.ConfigShapeError,
      severity: 'error',
      message: `Expected an object for "${path}".`,
      file: session.file,
      path,
    });
    markEmpty(module);
    return;
  }
  if (module.kind === 'composite') {
    for (const child of module.children) {
      const childInput = child.key === undefined ? input : input[child.key];
      populateModule(child.module, childInput, session, child.key ? `${path}.${child.key}` : path);
    }
    return;
  }
  for (const spec of module.schema) {
    const raw = input[spec.name];
    if (raw === undefined) continue;
    const stored: StoredField = { raw };
    if (spec.transform?.kind === 'bind' && !isZeroRaw(raw)) {
      stored.bound = spec.transform.apply(raw, module, session);
    }
    module.values.set(spec.name, stored);
  }
}

/** Mark a module (and all its children) as carrying no configuration. */
export function markEmpty(module: ConfigModule): void {
  module.markedEmpty = true;
  if (module.kind === 'leaf') {
    module.values.clear();
    return;
  }
  for (const c of module.children) markEmpty(c.module);
}

/**
 * A module is empty when marked so or when every raw value it holds is absent, zero,
 * or a list of zeros. The decision never looks at transformed values.
 */
export function isModuleEmpty(module: ConfigModule): boolean {
  if (module.markedEmpty) return true;
  if (module.kind === 'composite') return module.children.every((c) => isModuleEmpty(c.module));
  for (const stored of module.values.values()) {
    if (!isZeroRaw(stored.raw)) return false;
  }
  return true;
}

export function isZeroRaw(raw: JsonValue): boolean {
  if (raw === null || raw === false || raw === 0 || raw === '') return true;
  if (Array.isArray(raw)) return raw.every(isZeroRaw);
  return false;
}

/**
 * Default raw-to-value conversion.
 *
 * Numbers must be integers; strings may be decimal, `0x` hex or `0b` binary integers.
 */
export function valueFromRaw(raw: JsonValue, field: string): FieldValue {
  if (raw === null) return { kind: 'absent' };
  if (typeof raw === 'boolean') return { kind: 'int', value: raw ? 1n : 0n };
  if (typeof raw === 'number') {
    if (!Number.isInteger(raw)) {
      throw new TypeError(`Field "${field}" expects an integer (got ${raw})`);
    }
    return { kind: 'int', value: BigInt(raw) };
  }
  if (typeof raw === 'string') {
    const text = raw.trim();
    if (/^[+-]?(\d+|0[xX][0-9a-fA-F]+|0[bB][01]+)$/.test(text)) {
      const negative = text.startsWith('-');
      const magnitude = BigInt(text.replace(/^[+-]/, ''));
      return { kind: 'int', value: negative ? -magnitude : magnitude };
    }
    throw new TypeError(`Field "${field}" cannot encode "${raw}" as an integer`);
  }
  if (Array.isArray(raw)) {
    return { kind: 'list', items: raw.map((item) => valueFromRaw(item, field)) };
  }
  throw new TypeError(`Field "${field}" cannot encode an object`);
}

/** Value a field encodes: bound value, else mapped raw value, else the raw value itself. */
function fieldValue(spec: FieldSpec, stored: StoredField | undefined): FieldValue {
  if (!stored) return { kind: 'absent' };
  if (stored.bound) return stored.bound;
  if (stored.raw === null) return { kind: 'absent' };
  if (spec.transform?.kind === 'map') return spec.transform.apply(stored.raw);
  if (spec.transform?.kind === 'bind') return { kind: 'absent' };
  return valueFromRaw(stored.raw, spec.name);
}

function scalarOf(value: FieldValue, field: string, session: CompilationSession): bigint {
  switch (value.kind) {
    case 'absent':
      return 0n;
    case 'int':
      return value.value;
    case 'bits':
      return value.bits.value;
    case 'ref':
      return BigInt(session.relativeIndex(value));
    case 'list':
      throw new TypeError(`Field "${field}" has a nested list`);
  }
}

/** Split a `width`-bit value into chunks of at most LIST_CHUNK_BITS, most significant first. */
function chunkBits(bits: BitVector): BitVector[] {
  const out: BitVector[] = [];
  let stop = bits.width;
  while (stop > 0) {
    const start = Math.max(0, stop - LIST_CHUNK_BITS);
    out.push(bits.slice(start, stop));
    stop = start;
  }
  return out;
}

/**
 * Encode one list-valued field.
 *
 * A list of only 0/1 is read as binary digits. Any other list is packed into `elements`
 * sub-fields of `width / elements` bits each (missing trailing elements are zero).
 */
function encodeList(
  spec: FieldSpec,
  items: readonly FieldValue[],
  session: CompilationSession,
): BitVector[] {
  const values = items.map((item) => scalarOf(item, spec.name, session));
  if (values.every((v) => v === 0n || v === 1n) && spec.elements === undefined) {
    if (values.length > spec.width) {
      throw new RangeError(`Field "${spec.name}" takes ${spec.width} digits (got ${values.length})`);
    }
    const digits = values.reduce<bigint>((acc, v) => (acc << 1n) | v, 0n);
    return chunkBits(new BitVector(digits, spec.width));
  }
  const elements = spec.elements ?? values.length;
  if (values.length > elements) {
    throw new RangeError(`Field "${spec.name}" takes ${elements} elements (got ${values.length})`);
  }
  if (spec.width % elements !== 0) {
    throw new RangeError(`Field "${spec.name}" width ${spec.width} does not split into ${elements} elements`);
  }
  const elementWidth = spec.width / elements;
  const padded = [...values, ...Array<bigint>(elements - values.length).fill(0n)];
  return chunkBits(BitVector.fromList(padded, elementWidth));
}

export function encodeField(
  spec: FieldSpec,
  stored: StoredField | undefined,
  session: CompilationSession,
): BitVector[] {
  const value = fieldValue(spec, stored);
  if (value.kind === 'list') return encodeList(spec, value.items, session);
  return [new BitVector(scalarOf(value, spec.name, session), spec.width)];
}

/**
 * Encode a module to its ordered bit vectors. Widths sum to {@link moduleWidth}.
 *
 * References force placement resolution on first use.
 */
export function encodeModule(module: ConfigModule, session: CompilationSession): BitVector[] {
  if (module.kind === 'composite') {
    return module.children.flatMap((c) => encodeModule(c.module, session));
  }
  return module.schema.flatMap((spec) => encodeField(spec, module.values.get(spec.name), session));
}

/** Concatenated binary string of a module's encoding. */
export function moduleBits(module: ConfigModule, session: CompilationSession): string {
  return encodeModule(module, session)
    .map((b) => b.toBinary())
    .join('');
}

/** Per-field encodings for inspection; nothing for an empty module. */
export function dumpModule(module: ConfigModule, session: CompilationSession): FieldDump[] {
  if (isModuleEmpty(module)) return [];
  if (module.kind === 'composite') {
    return module.children.flatMap((c) => dumpModule(c.module, session));
  }
  return module.schema.map((spec) => {
    const stored = module.values.get(spec.name);
    const bits = encodeField(spec, stored, session).reduce((acc, b) => acc.concat(b));
    return {
      module: module.label,
      field: spec.name,
      raw: stored ? JSON.stringify(stored.raw) : '-',
      binary: bits.toBinary(),
      hex: bits.toHex(),
    };
  });
}

/**
 * Reference field bound at population time.
 *
 * A name becomes a reference (and an edge into the module's identity node); an integer is
 * taken as an already-resolved relative index.
 */
export function referenceField(name: string, width: number): FieldSpec {
  return {
    name,
    width,
    transform: {
      kind: 'bind',
      apply: (raw, module, session) => {
        if (typeof raw === 'number' || raw === true) return valueFromRaw(raw, name);
        if (typeof raw !== 'string') {
          throw new TypeError(`Field "${name}" expects a node name (got ${JSON.stringify(raw)})`);
        }
        if (!module.identity) {
          throw new Error(`Module "${module.label}" has reference field "${name}" but no identity node`);
        }
        return session.connect(raw, module.identity);
      },
    },
  };
}

/** Field whose raw string is looked up in a table; unknown strings fall back to `otherwise`. */
export function enumField(
  name: string,
  width: number,
  table: Readonly<Record<string, number>>,
  otherwise?: number,
): FieldSpec {
  return {
    name,
    width,
    transform: {
      kind: 'map',
      apply: (raw) => {
        if (typeof raw === 'string') {
          const code = Object.hasOwn(table, raw) ? table[raw] : undefined;
          if (code !== undefined) return { kind: 'int', value: BigInt(code) };
          if (otherwise !== undefined) return { kind: 'int', value: BigInt(otherwise) };
          throw new TypeError(
            `Field "${name}" expects one of ${Object.keys(table).join(', ')} (got "${raw}")`,
          );
        }
        return valueFromRaw(raw, name);
      },
    },
  };
}
