import { randomUUID } from 'crypto';
import { performance } from 'perf_hooks';

import {
  type BackendCall,
  type BackendClient,
  type BackendReply,
  type CallAttempt,
  previewBody,
} from './backend.js';
import { ErrorClass, classify, isSuccessStatus } from './classifier.js';
import {
  AdapterClosedError,
  CanceledError,
  ClientError,
  ServerError,
  TransportError,
} from './errors.js';
import { type Logger, createLogger } from './logger.js';
import { RetryPolicy, sleep } from './retry.js';
import { ScopedClient } from './scoped-client.js';

export const DEFAULT_CORRELATION_HEADER = 'X-Request-Id';

export interface DispatchOptions {
  /** Per-attempt timeout in milliseconds */
  timeoutMs: number;
  maxRetries: number;
  backoffMs: number;
  /** Extra headers sent with every attempt */
  headers?: Record<string, string>;
  correlationHeader?: string;
}

export interface DispatchRequest {
  text: string;
  payload: Record<string, unknown>;
  /** Generated when omitted; reused by every attempt of this call */
  correlationId?: string;
  signal?: AbortSignal;
}

export interface DispatchResult {
  correlationId: string;
  status: number;
  body: unknown;
  attempts: CallAttempt[];
}

interface Failure {
  cause: unknown;
  status?: number;
  bodyPreview?: string;
}

/**
 * DispatchEngine executes one logical backend call through zero or more
 * classified retries.
 *
 * - 4xx-equivalent statuses fail immediately with ClientError
 * - 5xx statuses and missing responses are retried with exponential backoff,
 *   then surface as ServerError
 * - anything else the client throws propagates untouched
 *
 * Attempts of one call run strictly one after another. The backend client is
 * created on first use and shared by concurrent calls until `close()`.
 */
export class DispatchEngine {
  private readonly scope: ScopedClient<BackendClient>;
  private readonly policy: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly correlationHeader: string;
  private readonly logger: Logger;

  constructor(
    openClient: () => BackendClient | Promise<BackendClient>,
    options: DispatchOptions,
    logger?: Logger,
  ) {
    this.scope = new ScopedClient(openClient);
    this.policy = new RetryPolicy(options);
    this.timeoutMs = options.timeoutMs;
    this.headers = options.headers ?? {};
    this.correlationHeader = options.correlationHeader ?? DEFAULT_CORRELATION_HEADER;
    this.logger = logger ?? createLogger('dispatch');
  }

  get retryPolicy(): RetryPolicy {
    return this.policy;
  }

  get isClosed(): boolean {
    return this.scope.isClosed;
  }

  async dispatch(request: DispatchRequest): Promise<DispatchResult> {
    const correlationId = request.correlationId ?? randomUUID();
    const { signal } = request;
    const client = await this.scope.acquire();
    const headers = mergeHeaders(this.headers, this.correlationHeader, correlationId);
    const attempts: CallAttempt[] = [];
    const startedAt = performance.now();
    let lastFailure: Failure | undefined;

    for (let attempt = 0; attempt <= this.policy.maxRetries; attempt++) {
      if (this.scope.isClosed) {
        throw new AdapterClosedError();
      }
      if (signal?.aborted) {
        throw new CanceledError(correlationId, { cause: signal.reason });
      }

      const attemptStart = performance.now();
      let reply: BackendReply;
      try {
        reply = await this.sendOnce(client, {
          correlationId,
          attempt,
          text: request.text,
          payload: request.payload,
          headers,
        }, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw new CanceledError(correlationId, { cause: error });
        }
        const errorClass = classify(error);
        if (errorClass === undefined) {
          throw error;
        }
        attempts.push({ attempt, elapsedMs: elapsedSince(attemptStart), outcome: 'transient' });
        lastFailure = { cause: error };
        this.logger.warn({ correlationId, attempt, err: error }, 'Backend call produced no response');
        if (!(await this.backoff(attempts, errorClass, correlationId, signal))) break;
        continue;
      }

      const elapsedMs = elapsedSince(attemptStart);

      if (isSuccessStatus(reply.status)) {
        attempts.push({ attempt, elapsedMs, outcome: 'success', status: reply.status });
        this.logger.debug({ correlationId, attempt, status: reply.status, elapsedMs }, 'Backend call succeeded');
        return { correlationId, status: reply.status, body: reply.body, attempts };
      }

      const errorClass = classify(reply.status) ?? ErrorClass.Transient;
      const bodyPreview = previewBody(reply.body);

      if (errorClass === ErrorClass.ClientError) {
        attempts.push({ attempt, elapsedMs, outcome: 'client_error', status: reply.status });
        this.logger.warn({ correlationId, attempt, status: reply.status, elapsedMs }, 'Backend rejected request');
        throw new ClientError({
          correlationId,
          attempts,
          elapsedMs: elapsedSince(startedAt),
          status: reply.status,
          bodyPreview,
        });
      }

      attempts.push({ attempt, elapsedMs, outcome: 'transient', status: reply.status });
      lastFailure = {
        cause: new Error(`Backend returned ${reply.status}: ${bodyPreview}`),
        status: reply.status,
        bodyPreview,
      };
      this.logger.warn({ correlationId, attempt, status: reply.status, elapsedMs }, 'Backend call failed');
      if (!(await this.backoff(attempts, errorClass, correlationId, signal))) break;
    }

    const failure = lastFailure ?? { cause: new Error('No attempt was made') };
    this.logger.error({ correlationId, attempts: attempts.length }, 'Backend call exhausted retries');
    throw new ServerError({
      correlationId,
      attempts,
      elapsedMs: elapsedSince(startedAt),
      status: failure.status,
      bodyPreview: failure.bodyPreview,
      cause: failure.cause,
    });
  }

  /**
   * Release the backend client. Further calls fail until `reopen()`.
   */
  async close(): Promise<void> {
    await this.scope.release();
  }

  reopen(): void {
    this.scope.reopen();
  }

  private async sendOnce(
    client: BackendClient,
    call: Omit<BackendCall, 'signal'>,
    signal?: AbortSignal,
  ): Promise<BackendReply> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await client.send({ ...call, signal: controller.signal });
    } catch (error) {
      if (timedOut) {
        throw new TransportError(`Backend call timed out after ${this.timeoutMs}ms`, {
          reason: 'timeout',
          cause: error,
        });
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Wait before the next attempt. Returns false when the budget is spent.
   */
  private async backoff(
    attempts: CallAttempt[],
    errorClass: ErrorClass,
    correlationId: string,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const last = attempts[attempts.length - 1];
    if (!last || !this.policy.shouldRetry(last.attempt, errorClass)) {
      return false;
    }

    const delayMs = this.policy.delayFor(last.attempt);
    last.backoffMs = delayMs;
    this.logger.debug({ correlationId, attempt: last.attempt, delayMs }, 'Retrying backend call');
    try {
      await sleep(delayMs, signal);
    } catch (error) {
      throw new CanceledError(correlationId, { cause: error });
    }
    return true;
  }
}

/**
 * Configured headers first, then the correlation header, which they may not override.
 */
export function mergeHeaders(
  configured: Record<string, string>,
  correlationHeader: string,
  correlationId: string,
): Record<string, string> {
  const target = correlationHeader.toLowerCase();
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(configured)) {
    if (name.toLowerCase() !== target) {
      headers[name] = value;
    }
  }
  headers[correlationHeader] = correlationId;
  return headers;
}

function elapsedSince(start: number): number {
  return Math.round(performance.now() - start);
}
