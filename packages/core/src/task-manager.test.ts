import { type MessageSendParams, type ProtocolMessage, textMessage } from '@a2a-relay/protocol';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { InvalidStateError, NotFoundError, ServerError } from './errors.js';
import { type TaskExecutionContext, TaskManager } from './task-manager.js';
import type { TaskStateEvent } from './task-state-machine.js';

class Deferred<T> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => {};
  reject: (reason: unknown) => void = () => {};

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}

const params: MessageSendParams = {
  messages: [textMessage('user', 'write a haiku')],
  sessionId: 'session-1',
};

describe('TaskManager', () => {
  let manager: TaskManager;
  let pending: Deferred<ProtocolMessage>;
  let seen: TaskExecutionContext[];

  function createManager(retentionMs?: number): TaskManager {
    pending = new Deferred<ProtocolMessage>();
    seen = [];
    manager = new TaskManager(async (_params, context) => {
      seen.push(context);
      return pending.promise;
    }, { retentionMs });
    return manager;
  }

  afterEach(() => {
    manager.close();
  });

  it('returns a submitted task without waiting for the backend', async () => {
    createManager();

    const task = manager.create(params);

    expect(task.state).toBe('submitted');
    expect(task.id).toMatch(/^task_/);
    expect(task.result).toBeUndefined();
    await vi.waitFor(() => expect(manager.get(task.id).state).toBe('working'));
    expect(seen[0]?.correlationId).toBe(task.correlationId);
  });

  it('completes with the backend result', async () => {
    createManager();
    const task = manager.create(params);
    await vi.waitFor(() => expect(manager.get(task.id).state).toBe('working'));

    const reply = textMessage('assistant', 'autumn moonlight');
    pending.resolve(reply);
    const done = await manager.settled(task.id);

    expect(done.state).toBe('completed');
    expect(done.result).toBe(reply);
    expect(done.error).toBeUndefined();
  });

  it('records classified dispatch errors on failure', async () => {
    createManager();
    const task = manager.create(params);
    await vi.waitFor(() => expect(manager.get(task.id).state).toBe('working'));

    pending.reject(new ServerError({
      correlationId: task.correlationId,
      attempts: [{ attempt: 0, elapsedMs: 3, outcome: 'transient', status: 503 }],
      elapsedMs: 3,
      status: 503,
      bodyPreview: 'down',
      cause: new Error('Backend returned 503: down'),
    }));
    const failed = await manager.settled(task.id);

    expect(failed.state).toBe('failed');
    expect(failed.result).toBeUndefined();
    expect(failed.error).toMatchObject({
      code: 'SERVER_ERROR',
      retryable: true,
      details: { correlationId: task.correlationId, attempts: 1, status: 503, bodyPreview: 'down' },
    });
  });

  it('records unclassified errors as internal errors', async () => {
    createManager();
    const task = manager.create(params);
    await vi.waitFor(() => expect(manager.get(task.id).state).toBe('working'));

    pending.reject(new RangeError('bad things'));
    const failed = await manager.settled(task.id);

    expect(failed.error).toEqual({ code: 'INTERNAL_ERROR', message: 'bad things', retryable: false });
  });

  it('cancels working tasks, aborts the call and discards late results', async () => {
    createManager();
    const task = manager.create(params);
    await vi.waitFor(() => expect(manager.get(task.id).state).toBe('working'));

    const canceled = manager.cancel(task.id);
    expect(canceled.state).toBe('canceled');
    expect(seen[0]?.signal.aborted).toBe(true);

    pending.resolve(textMessage('assistant', 'too late'));
    await new Promise((resolve) => setTimeout(resolve, 5));

    const after = manager.get(task.id);
    expect(after.state).toBe('canceled');
    expect(after.result).toBeUndefined();
  });

  it('never starts tasks canceled before execution began', async () => {
    createManager();
    const task = manager.create(params);

    manager.cancel(task.id);
    await new Promise((resolve) => setTimeout(resolve, 5));

    expect(seen).toHaveLength(0);
    expect(manager.get(task.id).state).toBe('canceled');
  });

  it('rejects cancel after completion', async () => {
    createManager();
    const task = manager.create(params);
    pending.resolve(textMessage('assistant', 'done'));
    await manager.settled(task.id);

    expect(() => manager.cancel(task.id)).toThrow(InvalidStateError);
  });

  it('rejects delete while working', async () => {
    createManager();
    const task = manager.create(params);
    await vi.waitFor(() => expect(manager.get(task.id).state).toBe('working'));

    expect(() => manager.delete(task.id)).toThrow(InvalidStateError);
  });

  it('forgets deleted tasks', async () => {
    createManager();
    const task = manager.create(params);
    pending.resolve(textMessage('assistant', 'done'));
    await manager.settled(task.id);

    manager.delete(task.id);

    expect(() => manager.get(task.id)).toThrow(NotFoundError);
    expect(() => manager.delete(task.id)).toThrow(NotFoundError);
  });

  it('fails lookups of unknown ids', () => {
    createManager();
    expect(() => manager.get('task_missing')).toThrow('Task not found: task_missing');
  });

  it('evicts terminal tasks after the retention period', async () => {
    createManager(10);
    const task = manager.create(params);
    pending.resolve(textMessage('assistant', 'done'));
    await manager.settled(task.id);

    await vi.waitFor(() => expect(() => manager.get(task.id)).toThrow(NotFoundError));
    expect(manager.size).toBe(0);
  });

  it('reports every transition in order', async () => {
    createManager();
    const events: TaskStateEvent[] = [];
    manager.onTransition((event) => events.push(event));

    const task = manager.create(params);
    pending.resolve(textMessage('assistant', 'done'));
    await manager.settled(task.id);

    expect(events.map((e) => `${e.from}->${e.to}`)).toEqual(['submitted->working', 'working->completed']);
    expect(events.every((e) => e.taskId === task.id)).toBe(true);
  });

  it('cancels live tasks on close', async () => {
    createManager();
    const task = manager.create(params);
    await vi.waitFor(() => expect(manager.get(task.id).state).toBe('working'));

    manager.close();

    expect(seen[0]?.signal.aborted).toBe(true);
    expect(manager.size).toBe(0);
  });
});
