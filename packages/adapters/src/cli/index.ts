import type { Logger } from '@a2a-relay/core';
import type { MessageSendParams, ProtocolMessage } from '@a2a-relay/protocol';

import { type BackendRequest, BaseAgentAdapter, replyContextId } from '../base.js';
import { extractResultText, latestUserText, toAssistantMessage } from '../translate.js';

export interface CliAgentAdapterOptions {
  /** Executable to spawn for each call */
  command: string;
  /** Arguments; `{message}`, `{session_id}` and `{request_id}` are substituted with the argv protocol */
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
  protocol?: 'stdio' | 'argv';
  /** Exit codes that mean the invocation was rejected (default [2]) */
  clientExitCodes?: number[];
  killGraceMs?: number;
  name?: string;
  /** Per-call timeout (default 5 minutes) */
  timeoutMs?: number;
  maxRetries?: number;
  backoffMs?: number;
  asyncTasks?: boolean;
  logger?: Logger;
}

export const CLI_DEFAULTS = {
  timeoutMs: 300_000,
  maxRetries: 0,
  backoffMs: 1_000,
} as const;

/**
 * CLI Agent Adapter
 *
 * Runs a command-line agent once per message. Agent runs tend to be long
 * and have side effects, so retries are off and tasks are async by default.
 * With the stdio protocol the child receives
 * `{ message, session_id, context }` as JSON on stdin.
 */
export class CliAgentAdapter extends BaseAgentAdapter {
  constructor(options: CliAgentAdapterOptions) {
    super({
      name: options.name ?? 'cli',
      backend: {
        type: 'subprocess',
        command: options.command,
        args: options.args,
        cwd: options.cwd,
        env: options.env,
        protocol: options.protocol,
        clientExitCodes: options.clientExitCodes,
        killGraceMs: options.killGraceMs,
      },
      timeoutMs: options.timeoutMs ?? CLI_DEFAULTS.timeoutMs,
      maxRetries: options.maxRetries ?? CLI_DEFAULTS.maxRetries,
      backoffMs: options.backoffMs ?? CLI_DEFAULTS.backoffMs,
      asyncTasks: options.asyncTasks ?? true,
      logger: options.logger,
    });
  }

  protected toBackend(params: MessageSendParams): BackendRequest {
    const text = latestUserText(params);
    return {
      text,
      payload: {
        message: text,
        session_id: params.sessionId ?? null,
        context: params.context ?? null,
      },
    };
  }

  protected fromBackend(body: unknown, params: MessageSendParams): ProtocolMessage {
    // Plain stdout keeps its trailing newline
    const text = typeof body === 'string' ? body.trim() : extractResultText(body);
    return toAssistantMessage(text, replyContextId(params));
  }
}
