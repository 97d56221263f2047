/**
 * RPC Transport
 *
 * One HTTP POST per request. The reply body is read chunk by chunk into a
 * growing buffer and only returned once the stream has ended. Any reply
 * that arrives in full is returned whatever its HTTP status; only an
 * exchange that cannot complete is a TransportFailure.
 */

import { RpcRequest, Result, success, failure } from '../utils/types.js';
import { PipelineError, transportFailure, toError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { serializeRpcRequest } from './request.js';

const logger = createLogger('RPC_TRANSPORT');

export interface TransportOptions {
  endpoint: string;
  timeoutMs: number;
}

/**
 * Accumulates response chunks; nothing received is ever dropped
 */
class ResponseBuffer {
  private chunks: Uint8Array[] = [];
  private total = 0;

  append(chunk: Uint8Array): void {
    this.chunks.push(chunk);
    this.total += chunk.length;
  }

  get size(): number {
    return this.total;
  }

  toBytes(): Uint8Array {
    return new Uint8Array(Buffer.concat(this.chunks, this.total));
  }
}

function describeFetchError(error: Error, timeoutMs: number): string {
  if (error.name === 'TimeoutError' || error.name === 'AbortError') {
    return `RPC request timed out after ${timeoutMs} ms`;
  }
  return `RPC request failed: ${error.message}`;
}

export async function submitRpcRequest(
  request: RpcRequest,
  options: TransportOptions,
): Promise<Result<Uint8Array, PipelineError>> {
  const body = serializeRpcRequest(request);
  const signal = AbortSignal.timeout(options.timeoutMs);

  logger.debug('Submitting RPC request', {
    method: request.method,
    subcommand: request.subcommand,
    id: request.id,
    bytes: Buffer.byteLength(body, 'utf-8'),
  });

  try {
    const response = await fetch(options.endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
      signal,
    });

    if (!response.ok) {
      // The node answers errors with a JSON body; the decoder reads it
      logger.warn('RPC endpoint returned an error status', {
        method: request.method,
        status: response.status,
      });
    }

    const buffer = new ResponseBuffer();

    if (response.body) {
      const reader = response.body.getReader();
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        buffer.append(value);
      }
    }

    logger.debug('RPC response received', {
      method: request.method,
      status: response.status,
      bytes: buffer.size,
    });

    return success(buffer.toBytes());
  } catch (error) {
    const err = toError(error);
    const message = describeFetchError(err, options.timeoutMs);
    logger.error('RPC transport failure', { method: request.method, error: message });
    return failure(transportFailure(message, err));
  }
}
