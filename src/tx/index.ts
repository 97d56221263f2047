/**
 * Transaction Module Exports
 *
 * Builds the ledger's JSON transaction documents. Signing happens outside.
 */

export {
  TransactionItemBuilder,
  DEFAULT_INITIAL_CAPACITY,
  DEFAULT_MAX_CAPACITY,
} from './item-builder.js';
export type { ItemBuilderOptions } from './item-builder.js';
export {
  serializeInItem,
  serializeOutItem,
  serializeFeeItem,
  serializeItem,
  encodeSignItem,
  SIG_TYPE_DILITHIUM,
  SIGN_HASH_TYPE,
  FEE_SERVICE_ID,
  DILITHIUM_PUBLIC_KEY_SIZE,
  DILITHIUM_SECRET_KEY_SIZE,
  DILITHIUM_SIGNATURE_SIZE,
} from './items.js';
export {
  TransactionDraft,
  assembleTransaction,
  buildTransactionJson,
  planTransferItems,
} from './assembler.js';
