/**
 * Encoding helpers for the ledger's JSON transaction format
 *
 * Hashes render as "0x" + uppercase hex, binary blobs as padded base64,
 * and amounts stay decimal strings from end to end.
 */

import { Hash, HASH_SIZE, Result, success, failure } from './types.js';
import { PipelineError, invalidArgument } from './errors.js';

const HEX_PATTERN = /^[0-9a-fA-F]*$/;
const DECIMAL_AMOUNT_PATTERN = /^\d+(\.\d+)?$/;

/** 1 coin = 10^18 datoshi */
export const DATOSHI_DECIMALS = 18;

const UINT32_MAX = 0xffffffff;

/**
 * Render a 32-byte hash as "0x" followed by 64 uppercase hex characters
 */
export function formatHash(hash: Hash): Result<string, PipelineError> {
  if (hash.length !== HASH_SIZE) {
    return failure(invalidArgument(`Hash must be ${HASH_SIZE} bytes, got ${hash.length}`));
  }
  return success('0x' + Buffer.from(hash).toString('hex').toUpperCase());
}

/**
 * Parse a hex hash string, with or without the 0x prefix
 */
export function parseHash(hex: string): Result<Hash, PipelineError> {
  const digits = hex.startsWith('0x') || hex.startsWith('0X') ? hex.slice(2) : hex;

  if (digits.length !== HASH_SIZE * 2 || !HEX_PATTERN.test(digits)) {
    return failure(invalidArgument(`Invalid hash string: ${hex}`));
  }

  return success(new Uint8Array(Buffer.from(digits, 'hex')));
}

/**
 * Base64 with '=' padding and no line breaks, the form the ledger's
 * parser takes for pub_key_b64 / sig_b64.
 */
export function encodeBase64Url(data: Uint8Array): Result<string, PipelineError> {
  if (data.length === 0) {
    return failure(invalidArgument('Cannot encode an empty buffer'));
  }
  return success(Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64'));
}

export function decodeBase64Url(encoded: string): Uint8Array {
  return new Uint8Array(Buffer.from(encoded, 'base64'));
}

export function isDecimalAmount(value: string): boolean {
  return DECIMAL_AMOUNT_PATTERN.test(value);
}

export function isUint32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= UINT32_MAX;
}

/**
 * Convert a coin amount ("0.01") into a datoshi string ("10000000000000000").
 * Strings without a decimal point are taken as datoshi already.
 * Fractional digits past the 18th are dropped.
 */
export function coinsToDatoshi(amount: string): Result<string, PipelineError> {
  if (!isDecimalAmount(amount)) {
    return failure(invalidArgument(`Invalid amount: ${amount}`));
  }

  const [intPart, fracPart] = amount.split('.');
  if (fracPart === undefined) {
    return success(BigInt(intPart).toString());
  }

  const frac = fracPart.slice(0, DATOSHI_DECIMALS).padEnd(DATOSHI_DECIMALS, '0');
  const datoshi = BigInt(intPart) * 10n ** BigInt(DATOSHI_DECIMALS) + BigInt(frac);

  return success(datoshi.toString());
}
