import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

export type JsonPrimitive = null | boolean | number | string;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse configuration text into a JSON object.
 *
 * Returns `undefined` (with a diagnostic) when the text is not JSON or its top level is not an object.
 */
export function parseConfigText(
  text: string,
  file: string,
  diagnostics: Diagnostic[],
): JsonObject | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text) as unknown;
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.ConfigParseError,
      severity: 'error',
      message: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
      file,
    });
    return undefined;
  }
  if (!isJsonObject(parsed)) {
    diagnostics.push({
      id: DiagnosticIds.ConfigShapeError,
      severity: 'error',
      message: 'Configuration must be a JSON object at the top level.',
      file,
    });
    return undefined;
  }
  return parsed;
}

/**
 * Entries of a named-instance section (`loops`, `pes`, ...), in document order.
 *
 * A missing or `null` section has no entries. Any other non-object is reported.
 */
export function sectionEntries(
  document: JsonObject,
  key: string,
  file: string,
  diagnostics: Diagnostic[],
): Array<[string, JsonValue]> {
  const section = document[key];
  if (section === undefined || section === null) return [];
  if (!isJsonObject(section)) {
    diagnostics.push({
      id: DiagnosticIds.ConfigShapeError,
      severity: 'error',
      message: `Section "${key}" must be an object keyed by instance name.`,
      file,
      path: key,
    });
    return [];
  }
  return Object.entries(section);
}
