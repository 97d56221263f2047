/**
 * RPC request envelope
 *
 * The node expects {"method","subcommand","arguments","id"} in that order.
 * An unused subcommand is sent as "" and unused arguments as {}; the node
 * rejects envelopes that omit either.
 */

import { JsonValue, RpcRequest, Result, success, failure } from '../utils/types.js';
import { PipelineError, invalidArgument } from '../utils/errors.js';

export interface RpcRequestOptions {
  subcommand?: string;
  arguments?: JsonValue;
  id?: number;
}

export const DEFAULT_REQUEST_ID = 1;

export function buildRpcRequest(
  method: string,
  options: RpcRequestOptions = {},
): Result<RpcRequest, PipelineError> {
  if (!method) {
    return failure(invalidArgument('RPC method is required'));
  }

  const id = options.id ?? DEFAULT_REQUEST_ID;
  if (!Number.isSafeInteger(id)) {
    return failure(invalidArgument(`RPC id must be an integer, got ${id}`));
  }

  return success({
    method,
    subcommand: options.subcommand ?? '',
    arguments: options.arguments ?? {},
    id,
  });
}

export function serializeRpcRequest(request: RpcRequest): string {
  return JSON.stringify({
    method: request.method,
    subcommand: request.subcommand,
    arguments: request.arguments,
    id: request.id,
  });
}
