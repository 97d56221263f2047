/**
 * RPC response decoding tests
 */

import { describe, it, expect } from 'vitest';
import { decodeRpcResponse, readInteger } from './response.js';
import { isJsonObject } from '../utils/types.js';

function bytes(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'utf-8'));
}

function reasonOf(text: string): string | undefined {
  const result = decodeRpcResponse(bytes(text));
  return result.ok ? undefined : result.error.reason;
}

describe('decodeRpcResponse', () => {
  it('decodes a complete reply', () => {
    const result = decodeRpcResponse(
      bytes('{"type":1,"result":{"hash":"0xAB"},"id":3,"version":2}'),
    );
    expect(result).toEqual({
      ok: true,
      value: { type: 1, result: { hash: '0xAB' }, id: 3, version: 2 },
    });
  });

  it('defaults missing fields', () => {
    expect(decodeRpcResponse(bytes('{"id":5}'))).toEqual({
      ok: true,
      value: { type: 0, result: null, id: 5, version: 0 },
    });
  });

  it('reads integers sent as strings', () => {
    const result = decodeRpcResponse(bytes('{"version":"2","type":true}'));
    expect(result.ok && result.value).toEqual({ type: 1, result: null, id: 0, version: 2 });
  });

  it('keeps array and scalar results as they are', () => {
    const list = decodeRpcResponse(bytes('{"result":[1,"a"]}'));
    const scalar = decodeRpcResponse(bytes('{"result":"done"}'));
    expect(list.ok && list.value.result).toEqual([1, 'a']);
    expect(scalar.ok && scalar.value.result).toBe('done');
  });

  it('reads numbers beyond the double range as null', () => {
    expect(decodeRpcResponse(bytes('{"id":5,"result":{"v":1e400}}'))).toEqual({
      ok: true,
      value: { type: 0, result: { v: null }, id: 5, version: 0 },
    });
  });

  it('keeps a __proto__ key inside the result', () => {
    const result = decodeRpcResponse(bytes('{"result":{"__proto__":{"x":1}}}'));
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const value = result.value.result;
    expect(isJsonObject(value)).toBe(true);
    if (!isJsonObject(value)) return;
    expect(Object.keys(value)).toEqual(['__proto__']);
    expect(Object.getOwnPropertyDescriptor(value, '__proto__')?.value).toEqual({ x: 1 });
    expect(Object.getPrototypeOf(value)).toBe(Object.prototype);
  });

  it('reports empty and malformed bodies as invalid_json', () => {
    expect(reasonOf('')).toBe('invalid_json');
    expect(reasonOf('   \n')).toBe('invalid_json');
    expect(reasonOf('{"type":')).toBe('invalid_json');
    expect(reasonOf('<html>')).toBe('invalid_json');
  });

  it('reports valid JSON that is not an object as not_object', () => {
    expect(reasonOf('[1,2]')).toBe('not_object');
    expect(reasonOf('"str"')).toBe('not_object');
    expect(reasonOf('null')).toBe('not_object');
  });

  it('uses DecodeFailure as the error kind', () => {
    const result = decodeRpcResponse(bytes('nope'));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('DecodeFailure');
    }
  });
});

describe('readInteger', () => {
  it('converts JSON values the way the node does', () => {
    expect(readInteger(7)).toBe(7);
    expect(readInteger(7.9)).toBe(7);
    expect(readInteger('42')).toBe(42);
    expect(readInteger(' -3abc')).toBe(-3);
    expect(readInteger('abc')).toBe(0);
    expect(readInteger(true)).toBe(1);
    expect(readInteger(false)).toBe(0);
    expect(readInteger(null)).toBe(0);
    expect(readInteger({ a: 1 })).toBe(0);
    expect(readInteger(undefined)).toBe(0);
  });
});
