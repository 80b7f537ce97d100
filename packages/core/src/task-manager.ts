import { randomUUID } from 'crypto';

import {
  type ErrorPayload,
  ID_PREFIXES,
  type MessageSendParams,
  type ProtocolMessage,
  type Task,
  type TaskState,
  isTerminalState,
} from '@a2a-relay/protocol';
import { nanoid } from 'nanoid';

import {
  CanceledError,
  InvalidStateError,
  NotFoundError,
  isRelayError,
  toErrorPayload,
} from './errors.js';
import { type Logger, createLogger } from './logger.js';
import {
  TaskStateMachine,
  type TaskTransitionListener,
  isCancelable,
  isValidTransition,
} from './task-state-machine.js';

export interface TaskExecutionContext {
  taskId: string;
  correlationId: string;
  /** Aborted when the task is canceled */
  signal: AbortSignal;
}

export type TaskExecutor = (
  params: MessageSendParams,
  context: TaskExecutionContext,
) => Promise<ProtocolMessage>;

export interface TaskManagerOptions {
  /** How long terminal tasks stay readable before eviction */
  retentionMs?: number;
  logger?: Logger;
}

export const DEFAULT_TASK_RETENTION_MS = 10 * 60_000;

interface TaskRecord {
  id: string;
  correlationId: string;
  state: TaskState;
  createdAt: Date;
  updatedAt: Date;
  params: MessageSendParams;
  controller: AbortController;
  result?: ProtocolMessage;
  error?: ErrorPayload;
  evictionTimer?: NodeJS.Timeout;
  waiters: Array<(task: Task) => void>;
}

/**
 * In-memory lifecycle tracking for backend invocations that outlive a
 * request/response cycle.
 *
 * Tasks move submitted → working → completed | failed | canceled. Only this
 * class mutates a task; callers get snapshots.
 */
export class TaskManager {
  private readonly tasks = new Map<string, TaskRecord>();
  private readonly machine = new TaskStateMachine();
  private readonly retentionMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly executor: TaskExecutor,
    options: TaskManagerOptions = {},
  ) {
    this.retentionMs = options.retentionMs ?? DEFAULT_TASK_RETENTION_MS;
    this.logger = options.logger ?? createLogger('task-manager');
  }

  get size(): number {
    return this.tasks.size;
  }

  /**
   * Register a task and start executing it in the background.
   */
  create(params: MessageSendParams): Task {
    const now = new Date();
    const record: TaskRecord = {
      id: `${ID_PREFIXES.task}${nanoid()}`,
      correlationId: randomUUID(),
      state: 'submitted',
      createdAt: now,
      updatedAt: now,
      params,
      controller: new AbortController(),
      waiters: [],
    };
    this.tasks.set(record.id, record);
    this.logger.info({ taskId: record.id, correlationId: record.correlationId }, 'Task submitted');

    setImmediate(() => {
      this.run(record).catch((error: unknown) => {
        this.logger.error({ err: error, taskId: record.id }, 'Task runner failed');
      });
    });

    return snapshot(record);
  }

  get(id: string): Task {
    return snapshot(this.require(id));
  }

  cancel(id: string): Task {
    const record = this.require(id);
    if (!isCancelable(record.state)) {
      throw new InvalidStateError(`Task ${id} is already ${record.state} and cannot be canceled`);
    }
    this.transition(record, 'canceled');
    record.controller.abort(new CanceledError(record.correlationId));
    return snapshot(record);
  }

  delete(id: string): void {
    const record = this.require(id);
    if (!isTerminalState(record.state)) {
      throw new InvalidStateError(`Task ${id} is still ${record.state}; cancel it before deleting`);
    }
    this.evict(record);
  }

  /**
   * Resolves with the task once it reaches a terminal state.
   */
  settled(id: string): Promise<Task> {
    const record = this.require(id);
    if (isTerminalState(record.state)) {
      return Promise.resolve(snapshot(record));
    }
    return new Promise((resolve) => {
      record.waiters.push(resolve);
    });
  }

  onTransition(listener: TaskTransitionListener): () => void {
    return this.machine.onTransition(listener);
  }

  /**
   * Cancel live tasks and drop everything.
   */
  close(): void {
    for (const record of this.tasks.values()) {
      if (isCancelable(record.state)) {
        this.cancel(record.id);
      }
      clearTimeout(record.evictionTimer);
    }
    this.tasks.clear();
  }

  private async run(record: TaskRecord): Promise<void> {
    if (record.state !== 'submitted') {
      return;
    }
    this.transition(record, 'working');

    try {
      const result = await this.executor(record.params, {
        taskId: record.id,
        correlationId: record.correlationId,
        signal: record.controller.signal,
      });
      if (record.state !== 'working') {
        this.logger.debug({ taskId: record.id, state: record.state }, 'Discarding result of finished task');
        return;
      }
      record.result = result;
      this.transition(record, 'completed');
    } catch (error) {
      if (record.state !== 'working') {
        return;
      }
      if (!isRelayError(error)) {
        this.logger.error({ err: error, taskId: record.id }, 'Task raised an unclassified error');
      }
      record.error = toErrorPayload(error);
      this.transition(record, 'failed');
    }
  }

  private transition<S extends TaskState>(record: TaskRecord, to: S): asserts record is TaskRecord & { state: S } {
    const from = record.state;
    if (!isValidTransition(from, to)) {
      throw new InvalidStateError(`Task ${record.id} cannot move from ${from} to ${to}`);
    }
    record.state = to;
    record.updatedAt = new Date();

    this.logger.info({ taskId: record.id, correlationId: record.correlationId, from, to }, 'Task state changed');
    this.machine.emitTransition({
      taskId: record.id,
      correlationId: record.correlationId,
      from,
      to,
      timestamp: record.updatedAt,
    });

    if (isTerminalState(to)) {
      this.scheduleEviction(record);
      const task = snapshot(record);
      for (const resolve of record.waiters.splice(0)) {
        resolve(task);
      }
    }
  }

  private scheduleEviction(record: TaskRecord): void {
    record.evictionTimer = setTimeout(() => {
      if (this.tasks.get(record.id) === record) {
        this.tasks.delete(record.id);
        this.logger.debug({ taskId: record.id }, 'Task evicted after retention period');
      }
    }, this.retentionMs);
    record.evictionTimer.unref();
  }

  private evict(record: TaskRecord): void {
    clearTimeout(record.evictionTimer);
    this.tasks.delete(record.id);
  }

  private require(id: string): TaskRecord {
    const record = this.tasks.get(id);
    if (!record) {
      throw new NotFoundError('Task', id);
    }
    return record;
  }
}

function snapshot(record: TaskRecord): Task {
  return {
    id: record.id,
    state: record.state,
    correlationId: record.correlationId,
    createdAt: record.createdAt.toISOString(),
    updatedAt: record.updatedAt.toISOString(),
    ...(record.result ? { result: record.result } : {}),
    ...(record.error ? { error: { ...record.error } } : {}),
  };
}
