/**
 * RPC response decoding
 *
 * Replies look like {"type":int,"result":any,"id":int,"version":int}, but
 * nodes leave fields out freely. Each field is read on its own and falls
 * back to 0 (or null for result); only unparseable bytes are an error.
 */

import { JsonObject, JsonValue, RpcResponse, Result, success, failure, isJsonObject } from '../utils/types.js';
import { PipelineError, decodeFailure } from '../utils/errors.js';
import { parseJson } from '../utils/json.js';

const INTEGER_STRING = /^\s*-?\d+/;

/**
 * Integer view of a JSON value: numbers are truncated, numeric strings are
 * parsed, booleans map to 0/1, anything else is 0.
 */
export function readInteger(value: JsonValue | undefined): number {
  if (typeof value === 'number') {
    return Math.trunc(value);
  }
  if (typeof value === 'string') {
    return INTEGER_STRING.test(value) ? Number.parseInt(value, 10) : 0;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  return 0;
}

function readField(object: JsonObject, key: string): JsonValue | undefined {
  return Object.prototype.hasOwnProperty.call(object, key) ? object[key] : undefined;
}

export function decodeRpcResponse(raw: Uint8Array): Result<RpcResponse, PipelineError> {
  const text = Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength).toString('utf-8');

  if (text.trim().length === 0) {
    return failure(decodeFailure('invalid_json', 'Empty RPC response body'));
  }

  const parsed = parseJson(text);
  if (!parsed.ok) {
    return failure(decodeFailure('invalid_json', 'RPC response is not valid JSON', parsed.error));
  }

  if (!isJsonObject(parsed.value)) {
    return failure(decodeFailure('not_object', 'RPC response is not a JSON object'));
  }

  const reply = parsed.value;
  return success({
    type: readInteger(readField(reply, 'type')),
    result: readField(reply, 'result') ?? null,
    id: readInteger(readField(reply, 'id')),
    version: readInteger(readField(reply, 'version')),
  });
}
