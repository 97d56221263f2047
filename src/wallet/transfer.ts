/**
 * Transfer Pipeline
 *
 * Runs one transfer end to end: assemble → sign → attach → finalize → submit.
 * Key material stays with the signer; this module only sees the public key
 * and the returned signature. No retries: the caller decides what to do
 * with a failure.
 */

import {
  TransferParams,
  TransactionDocument,
  RpcResponse,
  Result,
  success,
  failure,
} from '../utils/types.js';
import { PipelineError, signingFailure, toError } from '../utils/errors.js';
import { getConfig } from '../utils/config.js';
import { createLogger } from '../utils/logger.js';
import { assembleTransaction } from '../tx/index.js';
import { LedgerRpcClient } from '../rpc/index.js';

const logger = createLogger('WALLET');

/**
 * External post-quantum signer
 */
export interface TransactionSigner {
  readonly publicKey: Uint8Array;
  sign(payload: Uint8Array): Promise<Uint8Array>;
}

export interface TransferRequest extends TransferParams {
  /** Defaults to CELLFRAME_NETWORK */
  readonly net?: string;
  /** Defaults to CELLFRAME_CHAIN */
  readonly chain?: string;
  /** Unix seconds; defaults to now */
  readonly timestamp?: number;
}

export interface TransferOutcome {
  readonly document: TransactionDocument;
  readonly response: RpcResponse;
}

export async function sendTransfer(
  request: TransferRequest,
  signer: TransactionSigner,
  client: LedgerRpcClient,
): Promise<Result<TransferOutcome, PipelineError>> {
  const draftResult = assembleTransaction(request);
  if (!draftResult.ok) return draftResult;
  const draft = draftResult.value;

  let signature: Uint8Array;
  try {
    signature = await signer.sign(draft.signingPayload());
  } catch (error) {
    draft.discard();
    logger.error('Signer rejected transaction', { error: toError(error).message });
    return failure(signingFailure('Signer rejected transaction', toError(error)));
  }

  if (signature.length === 0) {
    draft.discard();
    return failure(signingFailure('Signer returned an empty signature'));
  }

  const attached = draft.attachSignature(signer.publicKey, signature);
  if (!attached.ok) {
    draft.discard();
    return attached;
  }

  const document = draft.finalize(request.timestamp);
  if (!document.ok) {
    draft.discard();
    return document;
  }

  const config = getConfig();
  const response = await client.submitTransaction(
    request.net ?? config.CELLFRAME_NETWORK,
    request.chain ?? config.CELLFRAME_CHAIN,
    document.value,
  );
  if (!response.ok) {
    logger.error('Transfer submission failed', {
      kind: response.error.kind,
      error: response.error.message,
    });
    return response;
  }

  logger.info('Transfer submitted', {
    recipient: request.recipientAddr,
    amount: request.amount,
    token: request.token,
    responseType: response.value.type,
  });

  return success({ document: document.value, response: response.value });
}
