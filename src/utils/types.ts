/**
 * Core Type Definitions for the Cellframe Transfer Pipeline
 *
 * These types define the boundaries between the transaction layer,
 * the RPC layer and the wallet caller. Secret key material never
 * appears in these interfaces.
 */

// ============================================
// JSON VALUES
// ============================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================
// LEDGER TYPES
// ============================================

/**
 * 32-byte transaction hash, stored as raw bytes
 */
export type Hash = Uint8Array;

export const HASH_SIZE = 32;

/**
 * Reference to a spendable prior output
 */
export interface UtxoRef {
  readonly prevHash: Hash;
  readonly prevIdx: number; // uint32
}

/**
 * Decimal amount string, e.g. "1.0" or "2000000000000000".
 * Amounts never pass through a floating-point number.
 */
export type Amount = string;

export type TransactionItem =
  | InItem
  | OutItem
  | FeeItem
  | SignItem;

export interface InItem {
  readonly type: 'in';
  readonly prevHash: Hash;
  readonly prevIdx: number;
}

/**
 * Plain output. The ledger parser rejects a token key on this item.
 */
export interface OutItem {
  readonly type: 'out';
  readonly addr: string;
  readonly value: Amount;
}

/**
 * Validator fee, serialized as an out_cond item with the fee subtype
 */
export interface FeeItem {
  readonly type: 'fee';
  readonly value: Amount;
}

export interface SignItem {
  readonly type: 'sign';
  readonly pubKey: Uint8Array;
  readonly signature: Uint8Array;
}

/**
 * Transfer parameters handed to the assembler
 */
export interface TransferParams {
  readonly utxos: readonly UtxoRef[];
  readonly recipientAddr: string;
  readonly amount: Amount;
  readonly networkFee?: Amount;
  readonly networkFeeAddr?: string;
  readonly validatorFee?: Amount;
  readonly changeAddr?: string;
  readonly changeAmount?: Amount;
  readonly token: string;
}

/**
 * Finalized transaction document, ready to be submitted
 */
export interface TransactionDocument {
  readonly json: string;
  readonly itemCount: number;
  readonly tsCreated: number;
}

// ============================================
// RPC TYPES
// ============================================

export interface RpcRequest {
  readonly method: string;
  readonly subcommand: string;
  readonly arguments: JsonValue;
  readonly id: number;
}

export interface RpcResponse {
  readonly type: number;
  readonly result: JsonValue | null;
  readonly id: number;
  readonly version: number;
}

// ============================================
// RESULT TYPES
// ============================================

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function success<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function failure<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
