import type { ErrorPayload } from '@a2a-relay/protocol';

import type { CallAttempt } from './backend.js';

export type RelayErrorCode =
  | 'CLIENT_ERROR'
  | 'SERVER_ERROR'
  | 'TRANSPORT_ERROR'
  | 'CANCELED'
  | 'ADAPTER_CLOSED'
  | 'NOT_FOUND'
  | 'INVALID_STATE';

/**
 * Base class for every error the relay raises on purpose.
 */
export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /**
   * Structured form used in task records and HTTP responses
   */
  toPayload(): ErrorPayload {
    const details = this.details();
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      ...(details ? { details } : {}),
    };
  }

  protected details(): Record<string, unknown> | undefined {
    return undefined;
  }
}

interface CallFailureInit {
  correlationId: string;
  attempts: CallAttempt[];
  elapsedMs: number;
  status?: number;
  bodyPreview?: string;
}

export abstract class CallFailure extends RelayError {
  readonly correlationId: string;
  readonly attempts: CallAttempt[];
  readonly elapsedMs: number;
  readonly status?: number;
  readonly bodyPreview?: string;

  constructor(message: string, init: CallFailureInit, options?: { cause?: unknown }) {
    super(message, options);
    this.correlationId = init.correlationId;
    this.attempts = init.attempts;
    this.elapsedMs = init.elapsedMs;
    this.status = init.status;
    this.bodyPreview = init.bodyPreview;
  }

  get attemptCount(): number {
    return this.attempts.length;
  }

  protected override details(): Record<string, unknown> {
    return {
      correlationId: this.correlationId,
      attempts: this.attemptCount,
      elapsedMs: this.elapsedMs,
      ...(this.status !== undefined ? { status: this.status } : {}),
      ...(this.bodyPreview !== undefined ? { bodyPreview: this.bodyPreview } : {}),
    };
  }
}

/**
 * The backend rejected the request (4xx-equivalent). Never retried.
 */
export class ClientError extends CallFailure {
  readonly code = 'CLIENT_ERROR';
  readonly retryable = false;

  constructor(init: CallFailureInit & { status: number; bodyPreview: string }) {
    super(
      `Backend rejected request with status ${init.status} ` +
        `(correlationId=${init.correlationId}, attempts=${init.attempts.length}, ${init.elapsedMs}ms): ${init.bodyPreview}`,
      init,
    );
  }
}

/**
 * Transient failures persisted through every allowed attempt.
 */
export class ServerError extends CallFailure {
  readonly code = 'SERVER_ERROR';
  readonly retryable = true;

  constructor(init: CallFailureInit & { cause: unknown }) {
    super(
      `Backend failed after ${init.attempts.length} attempt(s) ` +
        `(correlationId=${init.correlationId}, ${init.elapsedMs}ms): ${describeCause(init.cause)}`,
      init,
      { cause: init.cause },
    );
  }
}

export type TransportFailureReason = 'network' | 'timeout' | 'aborted';

/**
 * The backend produced no response at all. Raised by backend clients.
 */
export class TransportError extends RelayError {
  readonly code = 'TRANSPORT_ERROR';
  readonly retryable = true;
  readonly reason: TransportFailureReason;

  constructor(message: string, options: { reason: TransportFailureReason; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.reason = options.reason;
  }

  protected override details(): Record<string, unknown> {
    return { reason: this.reason };
  }
}

export class CanceledError extends RelayError {
  readonly code = 'CANCELED';
  readonly retryable = false;

  constructor(readonly correlationId: string, options?: { cause?: unknown }) {
    super(`Call canceled (correlationId=${correlationId})`, options);
  }
}

export class AdapterClosedError extends RelayError {
  readonly code = 'ADAPTER_CLOSED';
  readonly retryable = false;

  constructor(what = 'Backend client') {
    super(`${what} has been closed; reopen it before making further calls`);
  }
}

export class NotFoundError extends RelayError {
  readonly code = 'NOT_FOUND';
  readonly retryable = false;

  constructor(readonly resource: string, readonly id: string) {
    super(`${resource} not found: ${id}`);
  }
}

export class InvalidStateError extends RelayError {
  readonly code = 'INVALID_STATE';
  readonly retryable = false;

  constructor(message: string) {
    super(message);
  }
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}

/**
 * Convert any thrown value into an error payload
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof RelayError) {
    return error.toPayload();
  }
  return {
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : String(error),
    retryable: false,
  };
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
