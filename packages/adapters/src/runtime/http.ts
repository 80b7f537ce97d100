import {
  AdapterClosedError,
  type BackendCall,
  type BackendClient,
  type BackendReply,
  TransportError,
  decodeBody,
} from '@a2a-relay/core';

import type { HttpBackendConfig } from './types.js';

/**
 * HttpBackendClient sends each attempt as one JSON request.
 *
 * Any status the server answers with is returned as-is; only a missing
 * response (DNS, refused, reset) becomes a TransportError. Closing the
 * client aborts requests still in flight.
 */
export class HttpBackendClient implements BackendClient {
  readonly kind = 'http';
  private readonly url: string;
  private readonly method: 'POST' | 'PUT';
  private readonly inflight = new Set<AbortController>();
  private closed = false;

  constructor(config: HttpBackendConfig) {
    this.url = config.url;
    this.method = config.method ?? 'POST';
  }

  async send(call: BackendCall): Promise<BackendReply> {
    if (this.closed) {
      throw new AdapterClosedError('HTTP backend client');
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort(call.signal.reason);
    call.signal.addEventListener('abort', onAbort, { once: true });
    this.inflight.add(controller);

    try {
      const response = await fetch(this.url, {
        method: this.method,
        headers: {
          'Content-Type': 'application/json',
          ...call.headers,
        },
        body: JSON.stringify(call.payload),
        signal: controller.signal,
      });
      const text = await response.text();
      return { status: response.status, body: decodeBody(text) };
    } catch (error) {
      if (this.closed) {
        throw new AdapterClosedError('HTTP backend client');
      }
      if (call.signal.aborted) {
        throw error;
      }
      throw new TransportError(`Request to ${this.url} failed: ${error instanceof Error ? error.message : String(error)}`, {
        reason: 'network',
        cause: error,
      });
    } finally {
      call.signal.removeEventListener('abort', onAbort);
      this.inflight.delete(controller);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const controller of this.inflight) {
      controller.abort();
    }
    this.inflight.clear();
  }
}
