/**
 * Transaction item serializers
 *
 * Field names, key order and omissions follow the ledger's JSON parser
 * exactly. Items are emitted compact, without whitespace.
 */

import {
  TransactionItem,
  UtxoRef,
  Amount,
  Result,
  success,
  failure,
} from '../utils/types.js';
import { PipelineError, invalidArgument } from '../utils/errors.js';
import { formatHash, encodeBase64Url, isDecimalAmount, isUint32 } from '../utils/encoding.js';

/** Post-quantum signature family tag */
export const SIG_TYPE_DILITHIUM = 'sig_dil';

export const SIGN_HASH_TYPE = 1;

export const FEE_SERVICE_ID = '0x0000000000000000';

// Dilithium (MODE_1) sizes used by the wallet's signer. The encoder itself
// takes whatever lengths it is given.
export const DILITHIUM_PUBLIC_KEY_SIZE = 2592;
export const DILITHIUM_SECRET_KEY_SIZE = 4896;
export const DILITHIUM_SIGNATURE_SIZE = 4627;

function checkAmount(value: Amount, field: string): Result<Amount, PipelineError> {
  if (!isDecimalAmount(value)) {
    return failure(invalidArgument(`${field} must be a decimal string, got "${value}"`));
  }
  return success(value);
}

export function serializeInItem(utxo: UtxoRef): Result<string, PipelineError> {
  if (!isUint32(utxo.prevIdx)) {
    return failure(invalidArgument(`Output index out of range: ${utxo.prevIdx}`));
  }

  const hash = formatHash(utxo.prevHash);
  if (!hash.ok) return hash;

  return success(
    `{"type":"in","prev_hash":"${hash.value}","out_prev_idx":${utxo.prevIdx}}`
  );
}

/**
 * Plain "out" item. Never carries a token key: the ledger rejects it.
 */
export function serializeOutItem(addr: string, value: Amount): Result<string, PipelineError> {
  if (!addr) {
    return failure(invalidArgument('Output address is required'));
  }
  const amount = checkAmount(value, 'Output value');
  if (!amount.ok) return amount;

  return success(
    `{"type":"out","addr":${JSON.stringify(addr)},"value":"${amount.value}"}`
  );
}

export function serializeFeeItem(value: Amount): Result<string, PipelineError> {
  const amount = checkAmount(value, 'Fee value');
  if (!amount.ok) return amount;

  return success(
    `{"type":"out_cond","ts_expires":"never","value":"${amount.value}",` +
    `"service_id":"${FEE_SERVICE_ID}","subtype":"fee"}`
  );
}

/**
 * Build the "sign" item from a public key and a signature.
 * Sizes come from the buffer lengths.
 */
export function encodeSignItem(
  pubKey: Uint8Array,
  signature: Uint8Array,
): Result<string, PipelineError> {
  if (pubKey.length === 0 || signature.length === 0) {
    return failure(invalidArgument('Public key and signature must be non-empty'));
  }

  const pubKeyB64 = encodeBase64Url(pubKey);
  if (!pubKeyB64.ok) return pubKeyB64;

  const sigB64 = encodeBase64Url(signature);
  if (!sigB64.ok) return sigB64;

  return success(
    `{"type":"sign","sig_type":"${SIG_TYPE_DILITHIUM}",` +
    `"pub_key_size":${pubKey.length},"sig_size":${signature.length},` +
    `"hash_type":${SIGN_HASH_TYPE},` +
    `"pub_key_b64":"${pubKeyB64.value}","sig_b64":"${sigB64.value}"}`
  );
}

export function serializeItem(item: TransactionItem): Result<string, PipelineError> {
  switch (item.type) {
    case 'in':
      return serializeInItem({ prevHash: item.prevHash, prevIdx: item.prevIdx });
    case 'out':
      return serializeOutItem(item.addr, item.value);
    case 'fee':
      return serializeFeeItem(item.value);
    case 'sign':
      return encodeSignItem(item.pubKey, item.signature);
  }
}
