export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonKind = 'string' | 'number' | 'boolean' | 'null' | 'array' | 'object';

export type Outcome<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type JsonAccessError = {
  path: string;
  expected: JsonKind;
  actual: JsonKind | 'missing';
};

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function jsonKind(value: JsonValue): JsonKind {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'object';
  }
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return value !== undefined && jsonKind(value) === 'object';
}

/**
 * Narrows an arbitrary parsed value (e.g. the result of `JSON.parse` or `response.json()`)
 * to a JSON value, rejecting anything JSON cannot represent.
 */
export function toJsonValue(input: unknown): JsonValue | undefined {
  if (input === null || typeof input === 'string' || typeof input === 'boolean') {
    return input;
  }
  if (typeof input === 'number') {
    return Number.isFinite(input) ? input : undefined;
  }
  if (Array.isArray(input)) {
    const items: JsonValue[] = [];
    for (const item of input) {
      const converted = toJsonValue(item);
      if (converted === undefined) {
        return undefined;
      }
      items.push(converted);
    }
    return items;
  }
  if (typeof input === 'object') {
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(input)) {
      const converted = toJsonValue(entry);
      if (converted === undefined) {
        return undefined;
      }
      result[key] = converted;
    }
    return result;
  }
  return undefined;
}

export function parseJson(text: string): Outcome<JsonValue, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return fail(err instanceof Error ? err.message : String(err));
  }
  const value = toJsonValue(parsed);
  return value === undefined ? fail('document contains values that are not JSON') : ok(value);
}

export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}

function joinPath(parent: string, key: string | number): string {
  if (typeof key === 'number') {
    return `${parent}[${key}]`;
  }
  return parent ? `${parent}.${key}` : key;
}

function access(
  container: JsonObject,
  key: string,
  parentPath: string,
  expected: JsonKind
): Outcome<JsonValue, JsonAccessError> {
  const path = joinPath(parentPath, key);
  if (!Object.prototype.hasOwnProperty.call(container, key)) {
    return fail({ path, expected, actual: 'missing' });
  }
  const value = container[key];
  const actual = jsonKind(value);
  if (actual !== expected) {
    return fail({ path, expected, actual });
  }
  return ok(value);
}

export function readObject(
  container: JsonObject,
  key: string,
  parentPath = ''
): Outcome<JsonObject, JsonAccessError> {
  const result = access(container, key, parentPath, 'object');
  if (!result.ok) {
    return result;
  }
  return isJsonObject(result.value)
    ? ok(result.value)
    : fail({ path: joinPath(parentPath, key), expected: 'object', actual: jsonKind(result.value) });
}

export function readArray(
  container: JsonObject,
  key: string,
  parentPath = ''
): Outcome<JsonValue[], JsonAccessError> {
  const result = access(container, key, parentPath, 'array');
  if (!result.ok) {
    return result;
  }
  return Array.isArray(result.value)
    ? ok(result.value)
    : fail({ path: joinPath(parentPath, key), expected: 'array', actual: jsonKind(result.value) });
}

export function readString(
  container: JsonObject,
  key: string,
  parentPath = ''
): Outcome<string, JsonAccessError> {
  const result = access(container, key, parentPath, 'string');
  if (!result.ok) {
    return result;
  }
  return typeof result.value === 'string'
    ? ok(result.value)
    : fail({ path: joinPath(parentPath, key), expected: 'string', actual: jsonKind(result.value) });
}

export function describeAccessError(error: JsonAccessError): string {
  if (error.actual === 'missing') {
    return `${error.path} is missing`;
  }
  return `${error.path} must be ${error.expected === 'array' || error.expected === 'object' ? 'an' : 'a'} ${error.expected}, got ${error.actual}`;
}
