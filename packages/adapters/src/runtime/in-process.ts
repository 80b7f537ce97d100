import {
  AdapterClosedError,
  type BackendCall,
  type BackendClient,
  type BackendReply,
} from '@a2a-relay/core';

import type { Runnable, RunnableBackendConfig } from './types.js';

/**
 * RunnableBackendClient invokes a Runnable directly.
 *
 * A resolved value is a 200 reply. Errors carrying a numeric HTTP `status`
 * (as thrown by most model API clients) become a reply with that status so
 * they are classified like any other backend response; every other error
 * propagates to the caller unchanged.
 */
export class RunnableBackendClient implements BackendClient {
  readonly kind = 'runnable';
  private readonly runnable: Runnable;
  private closed = false;

  constructor(config: RunnableBackendConfig) {
    this.runnable = config.runnable;
  }

  async send(call: BackendCall): Promise<BackendReply> {
    if (this.closed) {
      throw new AdapterClosedError('Runnable backend client');
    }

    try {
      const output = await abortable(this.runnable.invoke(call.payload, { signal: call.signal }), call.signal);
      return { status: 200, body: output };
    } catch (error) {
      const status = statusOf(error);
      if (status === undefined || call.signal.aborted) {
        throw error;
      }
      return { status, body: { error: error instanceof Error ? error.message : String(error) } };
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * HTTP status attached to an error by an API client, if any.
 */
export function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return undefined;
  }
  const { status } = error;
  return typeof status === 'number' && Number.isInteger(status) && status >= 100 ? status : undefined;
}

/**
 * Settle with the abort reason as soon as the signal fires, even if the
 * runnable ignores its signal.
 */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
