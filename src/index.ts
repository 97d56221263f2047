/**
 * Cellframe Transfer Pipeline - Main Entry Point
 *
 * Transaction assembly, RPC submission and response decoding for the
 * messenger's embedded wallet.
 */

export * from './tx/index.js';
export * from './rpc/index.js';
export * from './wallet/index.js';
export {
  formatHash,
  parseHash,
  encodeBase64Url,
  decodeBase64Url,
  coinsToDatoshi,
  isDecimalAmount,
  DATOSHI_DECIMALS,
} from './utils/encoding.js';
export { PipelineError } from './utils/errors.js';
export type { PipelineErrorKind, DecodeFailureReason } from './utils/errors.js';
export { getConfig, resetConfig } from './utils/config.js';
export type { Config } from './utils/config.js';
export { createLogger } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';
export { success, failure, HASH_SIZE } from './utils/types.js';
export type {
  Hash,
  UtxoRef,
  Amount,
  TransactionItem,
  TransferParams,
  TransactionDocument,
  RpcRequest,
  RpcResponse,
  JsonValue,
  JsonObject,
  Result,
} from './utils/types.js';
