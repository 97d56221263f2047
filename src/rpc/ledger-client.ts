/**
 * Cellframe Ledger RPC Client
 *
 * Handles all ledger interactions over the public JSON-RPC endpoint:
 * - Generic build → submit → decode calls
 * - Transaction, block and balance lookups
 * - Submission of assembled transaction documents
 *
 * Each client owns its settings; there is no shared instance.
 */

import {
  JsonValue,
  RpcResponse,
  TransactionDocument,
  Result,
  success,
  failure,
} from '../utils/types.js';
import { PipelineError, invalidArgument } from '../utils/errors.js';
import { parseJson } from '../utils/json.js';
import { getConfig } from '../utils/config.js';
import { createLogger } from '../utils/logger.js';
import { buildRpcRequest } from './request.js';
import { submitRpcRequest, TransportOptions } from './transport.js';
import { decodeRpcResponse } from './response.js';

const logger = createLogger('RPC');

export type LedgerClientOptions = TransportOptions;

function requireStrings(values: Record<string, string>): Result<void, PipelineError> {
  for (const [name, value] of Object.entries(values)) {
    if (!value) {
      return failure(invalidArgument(`${name} is required`));
    }
  }
  return success(undefined);
}

/**
 * LedgerRpcClient - Handles all ledger RPC interactions
 */
export class LedgerRpcClient {
  private options: LedgerClientOptions;

  constructor(options: LedgerClientOptions) {
    this.options = { ...options };
  }

  get endpoint(): string {
    return this.options.endpoint;
  }

  /**
   * Build, submit and decode one RPC call
   */
  async call(
    method: string,
    subcommand?: string,
    args?: JsonValue,
    id?: number,
  ): Promise<Result<RpcResponse, PipelineError>> {
    const request = buildRpcRequest(method, { subcommand, arguments: args, id });
    if (!request.ok) return request;

    const raw = await submitRpcRequest(request.value, this.options);
    if (!raw.ok) return raw;

    const response = decodeRpcResponse(raw.value);
    if (!response.ok) {
      logger.warn('Failed to decode RPC response', {
        method,
        reason: response.error.reason,
        bytes: raw.value.length,
      });
      return response;
    }

    logger.debug('RPC call completed', {
      method,
      subcommand: request.value.subcommand,
      type: response.value.type,
      hasResult: response.value.result !== null,
    });

    return response;
  }

  /**
   * Get transaction details
   */
  async getTx(net: string, txHash: string): Promise<Result<RpcResponse, PipelineError>> {
    const valid = requireStrings({ net, txHash });
    if (!valid.ok) return valid;

    return this.call('tx_history', '', { net, tx: txHash });
  }

  /**
   * Get block details
   */
  async getBlock(net: string, blockNum: number | bigint): Promise<Result<RpcResponse, PipelineError>> {
    const valid = requireStrings({ net });
    if (!valid.ok) return valid;

    if (typeof blockNum === 'number' && (!Number.isSafeInteger(blockNum) || blockNum < 0)) {
      return failure(invalidArgument(`Invalid block number: ${blockNum}`));
    }
    if (typeof blockNum === 'bigint' && blockNum < 0n) {
      return failure(invalidArgument(`Invalid block number: ${blockNum}`));
    }

    return this.call('block', 'dump', { net, num: blockNum.toString() });
  }

  /**
   * Get wallet balance for one token
   */
  async getBalance(
    net: string,
    addr: string,
    token: string,
  ): Promise<Result<RpcResponse, PipelineError>> {
    const valid = requireStrings({ net, addr, token });
    if (!valid.ok) return valid;

    return this.call('wallet', 'info', { net, addr, token });
  }

  /**
   * Submit a finalized transaction document
   */
  async submitTransaction(
    net: string,
    chain: string,
    document: TransactionDocument,
  ): Promise<Result<RpcResponse, PipelineError>> {
    const valid = requireStrings({ net, chain });
    if (!valid.ok) return valid;

    const tx = parseJson(document.json);
    if (!tx.ok) {
      return failure(invalidArgument(`Transaction document is not valid JSON: ${tx.error.message}`));
    }

    logger.info('Submitting transaction', {
      net,
      chain,
      itemCount: document.itemCount,
      tsCreated: document.tsCreated,
    });

    return this.call('tx_create_json', '', { net, chain, json_tx: tx.value });
  }
}

/**
 * Create a client from the environment configuration, with optional overrides
 */
export function createLedgerClient(overrides: Partial<LedgerClientOptions> = {}): LedgerRpcClient {
  const config = getConfig();

  return new LedgerRpcClient({
    endpoint: overrides.endpoint ?? config.CELLFRAME_RPC_URL,
    timeoutMs: overrides.timeoutMs ?? config.RPC_TIMEOUT_MS,
  });
}
