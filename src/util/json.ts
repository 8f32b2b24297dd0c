/**
 * JSON Value Model
 *
 * Upstream payloads are loosely versioned, so nothing is trusted to have a
 * shape. Values are classified into a tagged union and read through small
 * typed accessors that return null instead of throwing.
 */

export type JsonScalar = string | number | boolean | null;
export type JsonValue = JsonScalar | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Tagged view over a JSON value
 */
export type JsonNode =
  | { kind: 'object'; value: JsonObject }
  | { kind: 'array'; value: JsonValue[] }
  | { kind: 'scalar'; value: JsonScalar };

export function classify(value: JsonValue): JsonNode {
  if (Array.isArray(value)) return { kind: 'array', value };
  if (value !== null && typeof value === 'object') return { kind: 'object', value };
  return { kind: 'scalar', value };
}

/**
 * Parses text into a JsonValue (JSON.parse only ever produces JSON values)
 */
export function parseJson(text: string): JsonValue {
  const parsed: JsonValue = JSON.parse(text);
  return parsed;
}

export function asObject(value: JsonValue | undefined): JsonObject | null {
  if (value === undefined) return null;
  const node = classify(value);
  return node.kind === 'object' ? node.value : null;
}

export function asArray(value: JsonValue | undefined): JsonValue[] | null {
  if (value === undefined) return null;
  const node = classify(value);
  return node.kind === 'array' ? node.value : null;
}

/**
 * Reads a non-empty string field
 */
export function getString(obj: JsonObject | null, key: string): string | null {
  const v = obj?.[key];
  return typeof v === 'string' && v.length > 0 ? v : null;
}

/**
 * Reads a finite number field, accepting numeric strings
 */
export function getNumber(obj: JsonObject | null, key: string): number | null {
  return toNumber(obj?.[key]);
}

export function getObject(obj: JsonObject | null, key: string): JsonObject | null {
  return asObject(obj?.[key]);
}

export function getArray(obj: JsonObject | null, key: string): JsonValue[] | null {
  return asArray(obj?.[key]);
}

/**
 * Truthiness in the upstream's sense: false, 0, "" and null are all "unset"
 */
export function isTruthy(value: JsonValue | undefined): boolean {
  if (value === undefined || value === null) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object') return Object.keys(value).length > 0;
  return Boolean(value);
}

export function toNumber(value: JsonValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/**
 * Integer conversion that truncates toward zero; null when the value is not numeric
 */
export function toInteger(value: JsonValue | undefined): number | null {
  const n = toNumber(value);
  return n === null ? null : Math.trunc(n);
}

/**
 * Stringifies an id-like scalar (ESPN ids arrive as strings or numbers)
 */
export function toIdString(value: JsonValue | undefined): string | null {
  if (typeof value === 'string') return value.length > 0 ? value : null;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}
