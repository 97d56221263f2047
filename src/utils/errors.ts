/**
 * Pipeline error taxonomy
 *
 * Every public operation returns one of these inside a failed Result.
 */

export type PipelineErrorKind =
  | 'InvalidArgument'
  | 'AllocationFailure'
  | 'TransportFailure'
  | 'DecodeFailure'
  | 'SigningFailure';

export type DecodeFailureReason = 'invalid_json' | 'not_object';

interface PipelineErrorOptions {
  cause?: unknown;
  reason?: DecodeFailureReason;
}

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly reason?: DecodeFailureReason;

  constructor(kind: PipelineErrorKind, message: string, options: PipelineErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PipelineError';
    this.kind = kind;
    this.reason = options.reason;
  }
}

export function invalidArgument(message: string): PipelineError {
  return new PipelineError('InvalidArgument', message);
}

export function allocationFailure(message: string, cause?: unknown): PipelineError {
  return new PipelineError('AllocationFailure', message, { cause });
}

export function transportFailure(message: string, cause?: unknown): PipelineError {
  return new PipelineError('TransportFailure', message, { cause });
}

export function decodeFailure(
  reason: DecodeFailureReason,
  message: string,
  cause?: unknown,
): PipelineError {
  return new PipelineError('DecodeFailure', message, { reason, cause });
}

export function signingFailure(message: string, cause?: unknown): PipelineError {
  return new PipelineError('SigningFailure', message, { cause });
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
