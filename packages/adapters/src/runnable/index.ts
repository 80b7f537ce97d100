import type { Logger } from '@a2a-relay/core';
import type { MessageSendParams, ProtocolMessage } from '@a2a-relay/protocol';

import { type BackendRequest, BaseAgentAdapter, replyContextId } from '../base.js';
import type { Runnable } from '../runtime/types.js';
import { extractResultText, isRecord, latestUserText, toAssistantMessage } from '../translate.js';

export interface RunnableAdapterOptions {
  runnable: Runnable;
  name?: string;
  /** Input variable the message text is bound to (default "input") */
  inputKey?: string;
  timeoutMs?: number;
  maxRetries?: number;
  backoffMs?: number;
  asyncTasks?: boolean;
  logger?: Logger;
}

export const RUNNABLE_DEFAULTS = {
  timeoutMs: 60_000,
  maxRetries: 0,
  backoffMs: 500,
} as const;

/**
 * Runnable Adapter
 *
 * Serves an in-process chain or agent with an `invoke(input)` method.
 */
export class RunnableAdapter extends BaseAgentAdapter {
  private readonly inputKey: string;

  constructor(options: RunnableAdapterOptions) {
    super({
      name: options.name ?? 'runnable',
      backend: { type: 'runnable', runnable: options.runnable },
      timeoutMs: options.timeoutMs ?? RUNNABLE_DEFAULTS.timeoutMs,
      maxRetries: options.maxRetries ?? RUNNABLE_DEFAULTS.maxRetries,
      backoffMs: options.backoffMs ?? RUNNABLE_DEFAULTS.backoffMs,
      asyncTasks: options.asyncTasks ?? false,
      logger: options.logger,
    });
    this.inputKey = options.inputKey ?? 'input';
  }

  protected toBackend(params: MessageSendParams): BackendRequest {
    const text = latestUserText(params);
    return { text, payload: { [this.inputKey]: text } };
  }

  protected fromBackend(body: unknown, params: MessageSendParams): ProtocolMessage {
    return toAssistantMessage(runnableOutputText(body), replyContextId(params));
  }
}

/**
 * Reply text of a runnable result. Chat model messages carry it in `content`.
 */
export function runnableOutputText(output: unknown): string {
  if (typeof output === 'string') {
    return output;
  }
  if (isRecord(output) && typeof output.content === 'string') {
    return output.content;
  }
  return extractResultText(output);
}
