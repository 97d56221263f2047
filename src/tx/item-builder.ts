/**
 * Transaction Item Builder
 *
 * Accumulates serialized transaction items into the ledger's JSON document:
 *
 *   {"items":[<item>,<item>,...],"ts_created":<unix-seconds>,"datum_type":"tx"}
 *
 * The backing buffer grows by doubling. finalize() hands the document to the
 * caller and seals the builder; a sealed builder accepts nothing further.
 */

import { Result, success, failure } from '../utils/types.js';
import { PipelineError, allocationFailure, invalidArgument, toError } from '../utils/errors.js';

export const DEFAULT_INITIAL_CAPACITY = 4096;

/** Largest document the builder will grow to (1 MiB) */
export const DEFAULT_MAX_CAPACITY = 1024 * 1024;

const DOCUMENT_PREFIX = Buffer.from('{"items":[', 'utf-8');
const COMMA = 0x2c;

export interface ItemBuilderOptions {
  initialCapacity?: number;
  maxCapacity?: number;
}

export class TransactionItemBuilder {
  private buffer: Buffer;
  private length = 0;
  private items = 0;
  private sealed = false;
  private readonly maxCapacity: number;

  constructor(options: ItemBuilderOptions = {}) {
    const initialCapacity = Math.max(
      options.initialCapacity ?? DEFAULT_INITIAL_CAPACITY,
      DOCUMENT_PREFIX.length,
    );
    this.maxCapacity = Math.max(options.maxCapacity ?? DEFAULT_MAX_CAPACITY, initialCapacity);
    this.buffer = Buffer.alloc(initialCapacity);

    DOCUMENT_PREFIX.copy(this.buffer, 0);
    this.length = DOCUMENT_PREFIX.length;
  }

  get size(): number {
    return this.length;
  }

  get capacity(): number {
    return this.buffer.length;
  }

  get itemCount(): number {
    return this.items;
  }

  get isFinalized(): boolean {
    return this.sealed;
  }

  /**
   * Append one serialized item, preceded by a comma unless it is the first
   */
  append(itemJson: string): Result<void, PipelineError> {
    if (this.sealed) {
      return failure(invalidArgument('Builder already finalized'));
    }
    if (itemJson.length === 0) {
      return failure(invalidArgument('Cannot append an empty item'));
    }

    const bytes = Buffer.from(itemJson, 'utf-8');
    const separator = this.items > 0 ? 1 : 0;

    const grown = this.ensureCapacity(this.length + separator + bytes.length);
    if (!grown.ok) return grown;

    if (separator) {
      this.buffer[this.length] = COMMA;
      this.length += 1;
    }
    bytes.copy(this.buffer, this.length);
    this.length += bytes.length;
    this.items += 1;

    return success(undefined);
  }

  /**
   * Serialized items appended so far, without the surrounding brackets
   */
  itemsPayload(): Uint8Array {
    return new Uint8Array(this.buffer.subarray(DOCUMENT_PREFIX.length, this.length));
  }

  /**
   * Close the items array, append ts_created and datum_type, and hand the
   * document over. The builder is sealed afterwards.
   */
  finalize(timestamp: number): Result<string, PipelineError> {
    if (this.sealed) {
      return failure(invalidArgument('Builder already finalized'));
    }
    if (!Number.isSafeInteger(timestamp) || timestamp < 0) {
      return failure(invalidArgument(`Invalid timestamp: ${timestamp}`));
    }

    const suffix = Buffer.from(`],"ts_created":${timestamp},"datum_type":"tx"}`, 'utf-8');
    const grown = this.ensureCapacity(this.length + suffix.length);
    if (!grown.ok) return grown;

    suffix.copy(this.buffer, this.length);
    this.length += suffix.length;

    const document = this.buffer.toString('utf-8', 0, this.length);
    this.release();

    return success(document);
  }

  /**
   * Zero and drop the in-progress buffer without producing a document
   */
  discard(): void {
    if (!this.sealed) {
      this.release();
    }
  }

  private release(): void {
    this.buffer.fill(0);
    this.buffer = Buffer.alloc(0);
    this.length = 0;
    this.sealed = true;
  }

  private ensureCapacity(required: number): Result<void, PipelineError> {
    if (this.buffer.length >= required) {
      return success(undefined);
    }

    let newCapacity = this.buffer.length * 2;
    while (newCapacity < required) {
      newCapacity *= 2;
    }

    if (newCapacity > this.maxCapacity) {
      if (required > this.maxCapacity) {
        return failure(
          allocationFailure(`Transaction exceeds ${this.maxCapacity} bytes (needs ${required})`),
        );
      }
      newCapacity = this.maxCapacity;
    }

    try {
      const next = Buffer.alloc(newCapacity);
      this.buffer.copy(next, 0, 0, this.length);
      this.buffer.fill(0);
      this.buffer = next;
      return success(undefined);
    } catch (error) {
      return failure(allocationFailure('Failed to grow transaction buffer', toError(error)));
    }
  }
}
