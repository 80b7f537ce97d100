import type { ErrorClass } from './classifier.js';

export interface RetryOptions {
  /** Retries after the first attempt. Negative or non-finite values mean none. */
  maxRetries: number;
  /** Base delay in milliseconds, doubled after every attempt */
  backoffMs: number;
}

export function normalizeMaxRetries(value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    return 0;
  }
  return Math.floor(value);
}

/**
 * Exponential backoff with a bounded number of attempts.
 *
 * Delay before attempt i+1 is `backoffMs * 2^i`.
 */
export class RetryPolicy {
  readonly maxRetries: number;
  readonly backoffMs: number;

  constructor(options: RetryOptions) {
    this.maxRetries = normalizeMaxRetries(options.maxRetries);
    this.backoffMs = Math.max(0, options.backoffMs);
  }

  get maxAttempts(): number {
    return this.maxRetries + 1;
  }

  delayFor(attempt: number): number {
    return this.backoffMs * 2 ** attempt;
  }

  shouldRetry(attempt: number, errorClass: ErrorClass): boolean {
    return errorClass === 'transient' && attempt < this.maxRetries;
  }
}

/**
 * Abortable delay. Rejects with the signal's reason when aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
