/**
 * Wallet Module Exports
 * 
 * Transfer orchestration for the wallet. Secret keys never enter this
 * module; signing is delegated to a TransactionSigner.
 */

export { sendTransfer } from './transfer.js';
export type { TransactionSigner, TransferRequest, TransferOutcome } from './transfer.js';
