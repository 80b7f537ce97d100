import { describe, expect, it, vi } from 'vitest';
import type { BackendCall, BackendClient, BackendReply } from './backend.js';
import { type DispatchOptions, DispatchEngine, mergeHeaders } from './dispatch.js';
import {
  AdapterClosedError,
  CanceledError,
  ClientError,
  ServerError,
  TransportError,
} from './errors.js';
import { sleep } from './retry.js';

class FakeClient implements BackendClient {
  readonly kind = 'fake';
  readonly calls: BackendCall[] = [];
  closeCount = 0;

  constructor(private readonly responder: (call: BackendCall) => Promise<BackendReply>) {}

  send(call: BackendCall): Promise<BackendReply> {
    this.calls.push(call);
    return this.responder(call);
  }

  async close(): Promise<void> {
    this.closeCount++;
  }
}

function engineFor(client: BackendClient, options: Partial<DispatchOptions> = {}) {
  return new DispatchEngine(() => client, {
    timeoutMs: 1_000,
    maxRetries: 2,
    backoffMs: 1,
    ...options,
  });
}

const request = { text: 'hello', payload: { message: 'hello' } };

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

describe('DispatchEngine', () => {
  it.each([0, 1, 3])('makes exactly one attempt on a client error (maxRetries=%i)', async (maxRetries) => {
    const client = new FakeClient(async () => ({ status: 422, body: { error: 'bad payload' } }));
    const engine = engineFor(client, { maxRetries });

    const error = await captureError(engine.dispatch(request));

    expect(error).toBeInstanceOf(ClientError);
    expect(client.calls).toHaveLength(1);
    if (error instanceof ClientError) {
      expect(error.status).toBe(422);
      expect(error.attemptCount).toBe(1);
      expect(error.bodyPreview).toBe('{"error":"bad payload"}');
      expect(error.message).toContain(`correlationId=${error.correlationId}`);
    }
  });

  it.each([0, 1, 3])('makes maxRetries + 1 attempts on server errors (maxRetries=%i)', async (maxRetries) => {
    const client = new FakeClient(async () => ({ status: 503, body: 'unavailable' }));
    const engine = engineFor(client, { maxRetries });

    const error = await captureError(engine.dispatch(request));

    expect(error).toBeInstanceOf(ServerError);
    expect(client.calls).toHaveLength(maxRetries + 1);
    if (error instanceof ServerError) {
      expect(error.attemptCount).toBe(maxRetries + 1);
      expect(error.status).toBe(503);
      expect(error.bodyPreview).toBe('unavailable');
    }
  });

  it('retries transport failures and reports the last cause', async () => {
    const cause = new TransportError('connect ECONNREFUSED', { reason: 'network' });
    const client = new FakeClient(async () => {
      throw cause;
    });
    const engine = engineFor(client, { maxRetries: 2 });

    const error = await captureError(engine.dispatch(request));

    expect(error).toBeInstanceOf(ServerError);
    expect(client.calls).toHaveLength(3);
    if (error instanceof ServerError) {
      expect(error.cause).toBe(cause);
      expect(error.status).toBeUndefined();
    }
  });

  it('returns the successful result after transient failures', async () => {
    const client = new FakeClient(async (call) =>
      call.attempt < 2 ? { status: 500, body: 'oops' } : { status: 200, body: { output: '42' } },
    );
    const engine = engineFor(client, { maxRetries: 3 });

    const result = await engine.dispatch(request);

    expect(result.body).toEqual({ output: '42' });
    expect(result.status).toBe(200);
    expect(result.attempts.map((a) => a.outcome)).toEqual(['transient', 'transient', 'success']);
  });

  it('backs off exponentially between attempts', async () => {
    const client = new FakeClient(async () => ({ status: 500, body: '' }));
    const engine = engineFor(client, { maxRetries: 3, backoffMs: 1 });

    const error = await captureError(engine.dispatch(request));

    expect(error).toBeInstanceOf(ServerError);
    if (error instanceof ServerError) {
      expect(error.attempts.map((a) => a.backoffMs)).toEqual([1, 2, 4, undefined]);
    }
  });

  it('treats a negative retry budget as no retries', async () => {
    const client = new FakeClient(async () => ({ status: 502, body: '' }));
    const engine = engineFor(client, { maxRetries: -3 });

    await expect(engine.dispatch(request)).rejects.toBeInstanceOf(ServerError);
    expect(client.calls).toHaveLength(1);
  });

  it('reuses one correlation id for every attempt and protects its header', async () => {
    const client = new FakeClient(async (call) =>
      call.attempt === 0 ? { status: 500, body: '' } : { status: 200, body: {} },
    );
    const engine = engineFor(client, {
      headers: { 'x-request-id': 'spoofed', Authorization: 'Bearer test-secret' },
    });

    const result = await engine.dispatch({ ...request, correlationId: 'corr-1' });

    expect(result.correlationId).toBe('corr-1');
    expect(client.calls.map((c) => c.correlationId)).toEqual(['corr-1', 'corr-1']);
    expect(client.calls[1]?.headers).toEqual({
      Authorization: 'Bearer test-secret',
      'X-Request-Id': 'corr-1',
    });
  });

  it('lets unclassified exceptions propagate without retrying', async () => {
    const boom = new TypeError('boom');
    const client = new FakeClient(async () => {
      throw boom;
    });
    const engine = engineFor(client, { maxRetries: 3 });

    await expect(engine.dispatch(request)).rejects.toBe(boom);
    expect(client.calls).toHaveLength(1);
  });

  it('turns attempt timeouts into retried transport errors', async () => {
    const client = new FakeClient((call) => new Promise((_resolve, reject) => {
      call.signal.addEventListener('abort', () => reject(new Error('aborted')));
    }));
    const engine = engineFor(client, { timeoutMs: 5, maxRetries: 1 });

    const error = await captureError(engine.dispatch(request));

    expect(error).toBeInstanceOf(ServerError);
    expect(client.calls).toHaveLength(2);
    if (error instanceof ServerError) {
      expect(error.cause).toBeInstanceOf(TransportError);
      expect(error.message).toContain('timed out after 5ms');
    }
  });

  it('stops waiting when the caller cancels during backoff', async () => {
    const controller = new AbortController();
    const client = new FakeClient(async () => {
      setTimeout(() => controller.abort(), 5);
      return { status: 500, body: '' };
    });
    const engine = engineFor(client, { maxRetries: 3, backoffMs: 60_000 });

    const error = await captureError(engine.dispatch({ ...request, signal: controller.signal }));

    expect(error).toBeInstanceOf(CanceledError);
    expect(client.calls).toHaveLength(1);
  });

  it('aborts the in-flight attempt when the caller cancels', async () => {
    const controller = new AbortController();
    const client = new FakeClient((call) => new Promise((_resolve, reject) => {
      call.signal.addEventListener('abort', () => reject(new Error('aborted')));
      setTimeout(() => controller.abort(), 5);
    }));
    const engine = engineFor(client, { maxRetries: 3 });

    await expect(engine.dispatch({ ...request, signal: controller.signal })).rejects.toBeInstanceOf(CanceledError);
    expect(client.calls).toHaveLength(1);
  });

  it('acquires the client lazily, releases it once and fails fast afterwards', async () => {
    const client = new FakeClient(async () => ({ status: 200, body: {} }));
    const factory = vi.fn(() => client);
    const engine = new DispatchEngine(factory, { timeoutMs: 100, maxRetries: 0, backoffMs: 1 });

    expect(factory).not.toHaveBeenCalled();
    await engine.dispatch(request);
    await engine.dispatch(request);
    expect(factory).toHaveBeenCalledTimes(1);

    await engine.close();
    await engine.close();
    expect(client.closeCount).toBe(1);
    expect(engine.isClosed).toBe(true);

    await expect(engine.dispatch(request)).rejects.toBeInstanceOf(AdapterClosedError);
    expect(client.calls).toHaveLength(2);

    engine.reopen();
    await expect(engine.dispatch(request)).resolves.toMatchObject({ status: 200 });
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('keeps attempts of each call sequential under concurrent load', async () => {
    const inflight = new Map<string, number>();
    let maxPerCall = 0;
    let active = 0;
    let maxActive = 0;

    const client = new FakeClient(async (call) => {
      const current = (inflight.get(call.correlationId) ?? 0) + 1;
      inflight.set(call.correlationId, current);
      maxPerCall = Math.max(maxPerCall, current);
      active++;
      maxActive = Math.max(maxActive, active);

      await sleep(5);

      inflight.set(call.correlationId, current - 1);
      active--;
      return call.attempt === 0
        ? { status: 502, body: 'busy' }
        : { status: 200, body: { output: call.correlationId } };
    });
    const engine = engineFor(client, { maxRetries: 2 });

    const [a, b] = await Promise.all([
      engine.dispatch({ ...request, correlationId: 'call-a' }),
      engine.dispatch({ ...request, correlationId: 'call-b' }),
    ]);

    expect(a.body).toEqual({ output: 'call-a' });
    expect(b.body).toEqual({ output: 'call-b' });
    expect(a.attempts).toHaveLength(2);
    expect(b.attempts).toHaveLength(2);
    expect(maxPerCall).toBe(1);
    expect(maxActive).toBe(2);
  });
});

describe('mergeHeaders', () => {
  it('drops configured headers that collide with the correlation header', () => {
    expect(mergeHeaders({ 'X-REQUEST-ID': 'x', 'X-Api-Key': 'test-key' }, 'X-Request-Id', 'id-1')).toEqual({
      'X-Api-Key': 'test-key',
      'X-Request-Id': 'id-1',
    });
  });
});
