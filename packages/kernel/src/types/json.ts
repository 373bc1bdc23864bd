/**
 * Switchboard Kernel: JSON Value Types
 *
 * Configuration payloads, verb arguments, replies and event payloads are all
 * plain JSON. These types and guards let the rest of the kernel narrow an
 * `unknown` value (from JSON.parse, a plugin or a dynamic import) without casts.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export type JsonArray = ReadonlyArray<JsonValue>;

export interface JsonObject {
  readonly [key: string]: JsonValue;
}

/** True for a non-null, non-array object. Values are not inspected. */
export function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively check that a value is JSON-serializable without loss.
 *
 * Rejects functions, symbols, bigints, undefined, non-finite numbers and
 * class instances other than plain objects and arrays.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      break;
    default:
      return false;
  }
  if (Array.isArray(value)) {
    return value.every((item) => isJsonValue(item));
  }
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) return false;
  return Object.values(value).every((item) => isJsonValue(item));
}

/** True for a JSON object (not an array, not null). */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** True for a JSON array. Narrows readonly arrays, which Array.isArray does not. */
export function isJsonArray(value: JsonValue | undefined): value is JsonArray {
  return Array.isArray(value);
}

/** Recursively freeze a JSON value in place and return it. */
export function deepFreeze<T extends JsonValue>(value: T): T {
  freezeJson(value);
  return value;
}

function freezeJson(value: JsonValue): void {
  if (typeof value !== 'object' || value === null) return;
  for (const child of Object.values(value)) {
    freezeJson(child);
  }
  Object.freeze(value);
}
