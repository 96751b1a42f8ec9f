import { PropertyError } from '../error/propertyError.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/**
 * A decoded JSON value; objects become {@link JsonObject} views and arrays are frozen.
 *
 * Numbers are IEEE doubles, so ids above 2^53 lose precision; read them from the
 * `id_str` companion fields the API sends alongside.
 */
export type JsonValue = JsonObject | readonly JsonValue[] | string | number | boolean | null;

/** Plain JSON, as produced by {@link JsonObject.toJSON}. */
export type PlainJson = { [key: string]: PlainJson } | PlainJson[] | string | number | boolean | null;

/**
 * Read-only view over a decoded JSON object.
 *
 * There are no mutation methods and the instance is frozen, so assigning to it
 * fails at runtime as well. Looking up a missing key returns a {@link PropertyError}
 * naming the key.
 */
export class JsonObject {
  #entries: ReadonlyMap<string, JsonValue>;

  constructor(entries: Iterable<readonly [string, JsonValue]>) {
    this.#entries = new Map(entries);
    Object.freeze(this);
  }

  /**
   * Looks up a property.
   * @returns `[null, value]` when present, `[PropertyError, null]` otherwise.
   */
  get(name: string): SafeWrap<PropertyError, JsonValue> {
    if (!this.#entries.has(name)) {
      return [new PropertyError(JsonObject.name, name), null];
    }

    return [null, this.#entries.get(name) ?? null];
  }

  has(name: string): boolean {
    return this.#entries.has(name);
  }

  keys(): string[] {
    return [...this.#entries.keys()];
  }

  entries(): Array<[string, JsonValue]> {
    return [...this.#entries.entries()];
  }

  get size(): number {
    return this.#entries.size;
  }

  /** Deep copy as plain JSON; used by `JSON.stringify`. */
  toJSON(): { [key: string]: PlainJson } {
    return Object.fromEntries([...this.#entries].map(([key, value]) => [key, toPlainJson(value)]));
  }

  toString(): string {
    return `<JsonObject: ${JSON.stringify(this)}>`;
  }
}

function toPlainJson(value: JsonValue): PlainJson {
  if (value instanceof JsonObject) {
    return value.toJSON();
  }

  if (isJsonArray(value)) {
    return value.map(toPlainJson);
  }

  return value;
}

/** Narrows a {@link JsonValue} to a (frozen) array. */
export function isJsonArray(value: JsonValue): value is readonly JsonValue[] {
  return Array.isArray(value);
}

/**
 * Converts the output of `JSON.parse` into {@link JsonValue} views, bottom-up.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    return Object.freeze(value.map(toJsonValue));
  }

  if (typeof value === 'object') {
    return new JsonObject(Object.entries(value).map(([key, item]): [string, JsonValue] => [key, toJsonValue(item)]));
  }

  return null;
}

/**
 * Parses JSON text into read-only views.
 */
export function decodeJson(text: string): SafeWrap<Error, JsonValue> {
  const [errParse, parsed] = safeWrap<Error, unknown>(() => JSON.parse(text));
  if (errParse) {
    return [new Error('error parsing json in decodeJson', { cause: errParse }), null];
  }

  return [null, toJsonValue(parsed)];
}
