/**
 * Transaction Assembler
 *
 * Lays out the items of a transfer in the order the ledger expects:
 *
 *   in* → recipient out → network-fee out? → fee (out_cond)? → change out? → sign
 *
 * Does NOT sign transactions - the caller signs the draft's payload and
 * hands the signature back through attachSignature().
 */

import {
  TransactionItem,
  TransferParams,
  TransactionDocument,
  Result,
  success,
  failure,
} from '../utils/types.js';
import { PipelineError, invalidArgument } from '../utils/errors.js';
import { isDecimalAmount } from '../utils/encoding.js';
import { createLogger } from '../utils/logger.js';
import { TransactionItemBuilder, ItemBuilderOptions } from './item-builder.js';
import { serializeItem, encodeSignItem } from './items.js';

const logger = createLogger('TX_ASSEMBLER');

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Unsigned transaction under construction. One draft per transfer attempt.
 */
export class TransactionDraft {
  private builder: TransactionItemBuilder;
  private signed = false;

  constructor(builder: TransactionItemBuilder) {
    this.builder = builder;
  }

  get itemCount(): number {
    return this.builder.itemCount;
  }

  get isSigned(): boolean {
    return this.signed;
  }

  /**
   * Bytes handed to the signer: every item serialized so far, comma
   * separated, without the enclosing brackets or the creation timestamp.
   */
  signingPayload(): Uint8Array {
    return this.builder.itemsPayload();
  }

  attachSignature(pubKey: Uint8Array, signature: Uint8Array): Result<void, PipelineError> {
    if (this.signed) {
      return failure(invalidArgument('Transaction already carries a signature'));
    }

    const item = encodeSignItem(pubKey, signature);
    if (!item.ok) return item;

    const appended = this.builder.append(item.value);
    if (!appended.ok) {
      this.builder.discard();
      return appended;
    }

    this.signed = true;
    logger.debug('Signature attached', {
      pubKeySize: pubKey.length,
      sigSize: signature.length,
    });
    return success(undefined);
  }

  finalize(timestamp: number = nowSeconds()): Result<TransactionDocument, PipelineError> {
    const itemCount = this.builder.itemCount;
    const json = this.builder.finalize(timestamp);
    if (!json.ok) return json;

    logger.info('Transaction finalized', {
      itemCount,
      signed: this.signed,
      bytes: Buffer.byteLength(json.value, 'utf-8'),
    });

    return success({ json: json.value, itemCount, tsCreated: timestamp });
  }

  /**
   * Abandon the draft, zeroing its buffer
   */
  discard(): void {
    this.builder.discard();
  }
}

function validateParams(params: TransferParams): Result<void, PipelineError> {
  if (!params.utxos) {
    return failure(invalidArgument('utxos are required'));
  }
  if (!params.recipientAddr) {
    return failure(invalidArgument('recipientAddr is required'));
  }
  if (!params.amount) {
    return failure(invalidArgument('amount is required'));
  }
  if (!params.token) {
    return failure(invalidArgument('token is required'));
  }

  const amounts: Array<[string, string | undefined]> = [
    ['amount', params.amount],
    ['networkFee', params.networkFee],
    ['validatorFee', params.validatorFee],
    ['changeAmount', params.changeAmount],
  ];
  for (const [field, value] of amounts) {
    if (value !== undefined && !isDecimalAmount(value)) {
      return failure(invalidArgument(`${field} must be a decimal string, got "${value}"`));
    }
  }

  return success(undefined);
}

/**
 * Item sequence for a transfer, in wire order
 */
export function planTransferItems(params: TransferParams): TransactionItem[] {
  const items: TransactionItem[] = params.utxos.map((utxo): TransactionItem => ({
    type: 'in',
    prevHash: utxo.prevHash,
    prevIdx: utxo.prevIdx,
  }));

  // The token is not serialized on out items
  items.push({ type: 'out', addr: params.recipientAddr, value: params.amount });

  if (params.networkFee && params.networkFeeAddr) {
    items.push({ type: 'out', addr: params.networkFeeAddr, value: params.networkFee });
  }

  if (params.validatorFee) {
    items.push({ type: 'fee', value: params.validatorFee });
  }

  if (params.changeAddr && params.changeAmount) {
    items.push({ type: 'out', addr: params.changeAddr, value: params.changeAmount });
  }

  return items;
}

/**
 * Assemble the unsigned items of a transfer into a draft
 */
export function assembleTransaction(
  params: TransferParams,
  options: ItemBuilderOptions = {},
): Result<TransactionDraft, PipelineError> {
  const valid = validateParams(params);
  if (!valid.ok) {
    logger.warn('Rejected transfer parameters', { error: valid.error.message });
    return valid;
  }

  const builder = new TransactionItemBuilder(options);
  const items = planTransferItems(params);

  for (const item of items) {
    const json = serializeItem(item);
    const appended = json.ok ? builder.append(json.value) : json;

    if (!appended.ok) {
      builder.discard();
      logger.error('Failed to assemble transaction', {
        itemType: item.type,
        kind: appended.error.kind,
        error: appended.error.message,
      });
      return appended;
    }
  }

  logger.debug('Assembled transaction items', {
    inputs: params.utxos.length,
    itemCount: builder.itemCount,
    token: params.token,
  });

  return success(new TransactionDraft(builder));
}

/**
 * Assemble and finalize a transfer without a sign item
 */
export function buildTransactionJson(
  params: TransferParams,
  timestamp: number = nowSeconds(),
): Result<TransactionDocument, PipelineError> {
  const draft = assembleTransaction(params);
  if (!draft.ok) return draft;

  const document = draft.value.finalize(timestamp);
  if (!document.ok) {
    draft.value.discard();
  }
  return document;
}
