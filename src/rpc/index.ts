/**
 * RPC Module Exports
 * 
 * This module handles all ledger JSON-RPC interactions.
 */

export { LedgerRpcClient, createLedgerClient } from './ledger-client.js';
export type { LedgerClientOptions } from './ledger-client.js';
export { buildRpcRequest, serializeRpcRequest, DEFAULT_REQUEST_ID } from './request.js';
export type { RpcRequestOptions } from './request.js';
export { submitRpcRequest } from './transport.js';
export type { TransportOptions } from './transport.js';
export { decodeRpcResponse, readInteger } from './response.js';
