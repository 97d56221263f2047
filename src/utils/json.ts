/**
 * JSON parsing into owned, structurally-typed values
 */

import { JsonValue, Result, success, failure } from './types.js';
import { toError } from './errors.js';

function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    // Literals past the double range parse to Infinity
    return Number.isFinite(value) ? value : null;
  }
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const entry of value) {
      const item = toJsonValue(entry);
      if (item === undefined) return undefined;
      items.push(item);
    }
    return items;
  }
  if (typeof value === 'object') {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      const item = toJsonValue(entry);
      if (item === undefined) return undefined;
      // Plain assignment would turn a "__proto__" key into a prototype
      Object.defineProperty(result, key, {
        value: item,
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return result;
  }
  return undefined;
}

export function parseJson(text: string): Result<JsonValue, Error> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return failure(toError(error));
  }

  const value = toJsonValue(parsed);
  if (value === undefined) {
    return failure(new Error('Parsed value is not plain JSON'));
  }
  return success(value);
}
