import {
  DispatchEngine,
  type DispatchResult,
  type Logger,
  createLogger,
} from '@a2a-relay/core';
import type { MessageSendParams, ProtocolMessage } from '@a2a-relay/protocol';

import { createBackendClient } from './runtime/factory.js';
import type { BackendConfig } from './runtime/types.js';

export interface HandleOptions {
  signal?: AbortSignal;
  /** Reused for every attempt; generated when omitted */
  correlationId?: string;
}

/**
 * Adapter Interface
 *
 * An adapter exposes one backend as a protocol agent: it turns a
 * message/send call into a backend invocation and the backend's answer
 * into an assistant message.
 */
export interface AgentAdapter {
  /**
   * Adapter name (e.g. 'webhook', 'cli')
   */
  readonly name: string;

  /**
   * Translate, dispatch and translate back. Rejects on any terminal failure;
   * a failed call never produces a reply.
   */
  handle(params: MessageSendParams, options?: HandleOptions): Promise<ProtocolMessage>;

  supportsStreaming(): boolean;

  /**
   * True when callers should run this adapter through the task manager
   * instead of waiting on `handle()`.
   */
  supportsAsyncTasks(): boolean;

  /**
   * Release the backend client. Calls fail fast until `reopen()`.
   */
  close(): Promise<void>;

  reopen(): void;

  readonly isClosed: boolean;
}

/**
 * Backend-native request produced by `toBackend()`
 */
export interface BackendRequest {
  /** Plain-text rendering of the triggering message */
  text: string;
  payload: Record<string, unknown>;
}

export interface BaseAdapterOptions {
  name: string;
  backend: BackendConfig;
  timeoutMs: number;
  maxRetries: number;
  backoffMs: number;
  headers?: Record<string, string>;
  correlationHeader?: string;
  asyncTasks?: boolean;
  logger?: Logger;
}

/**
 * Base adapter class with the dispatch plumbing.
 *
 * Subclasses implement only the translation pair; classification, retries
 * and the client lifecycle live in the DispatchEngine.
 */
export abstract class BaseAgentAdapter implements AgentAdapter {
  readonly name: string;
  protected readonly logger: Logger;
  private readonly engine: DispatchEngine;
  private readonly asyncTasks: boolean;

  constructor(options: BaseAdapterOptions) {
    this.name = options.name;
    this.asyncTasks = options.asyncTasks ?? false;
    this.logger = (options.logger ?? createLogger('adapter')).child({ adapter: options.name });

    const backend = options.backend;
    this.engine = new DispatchEngine(
      () => createBackendClient(backend),
      {
        timeoutMs: options.timeoutMs,
        maxRetries: options.maxRetries,
        backoffMs: options.backoffMs,
        headers: options.headers,
        correlationHeader: options.correlationHeader,
      },
      this.logger,
    );
  }

  protected abstract toBackend(params: MessageSendParams): BackendRequest;

  protected abstract fromBackend(body: unknown, params: MessageSendParams): ProtocolMessage;

  async handle(params: MessageSendParams, options: HandleOptions = {}): Promise<ProtocolMessage> {
    const request = this.toBackend(params);
    const result = await this.callBackend(request, options);
    const reply = this.fromBackend(result.body, params);
    this.logger.info(
      { correlationId: result.correlationId, attempts: result.attempts.length, status: result.status },
      'Backend call completed',
    );
    return reply;
  }

  supportsStreaming(): boolean {
    return false;
  }

  supportsAsyncTasks(): boolean {
    return this.asyncTasks;
  }

  get isClosed(): boolean {
    return this.engine.isClosed;
  }

  async close(): Promise<void> {
    await this.engine.close();
  }

  reopen(): void {
    this.engine.reopen();
  }

  protected callBackend(request: BackendRequest, options: HandleOptions = {}): Promise<DispatchResult> {
    return this.engine.dispatch({
      text: request.text,
      payload: request.payload,
      correlationId: options.correlationId,
      signal: options.signal,
    });
  }
}

/**
 * Context id of the newest message, carried over to the reply
 */
export function replyContextId(params: MessageSendParams): string | undefined {
  return params.messages[params.messages.length - 1]?.contextId;
}
