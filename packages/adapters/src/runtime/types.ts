import type { BackendClient } from '@a2a-relay/core';

/**
 * In-process unit of work with the invoke shape used by LLM chain libraries.
 */
export interface Runnable<TInput = Record<string, unknown>, TOutput = unknown> {
  invoke(input: TInput, options?: { signal?: AbortSignal }): Promise<TOutput>;
}

/**
 * Backend configuration – discriminated union on `type`.
 *
 * Implementations:
 *   - HttpBackendClient       – POSTs JSON to a webhook URL
 *   - SubprocessBackendClient – spawns a CLI per call
 *   - RunnableBackendClient   – invokes a Runnable in process
 */
export type BackendConfig =
  | HttpBackendConfig
  | SubprocessBackendConfig
  | RunnableBackendConfig;

export interface HttpBackendConfig {
  type: 'http';
  /** Target URL (e.g. a workflow webhook) */
  url: string;
  method?: 'POST' | 'PUT';
}

export interface SubprocessBackendConfig {
  type: 'subprocess';
  /** Executable to spawn, resolved through PATH */
  command: string;
  /**
   * Arguments. With the argv protocol, `{message}`, `{session_id}` and
   * `{request_id}` are substituted per call.
   */
  args?: string[];
  cwd?: string;
  /** Extra environment variables */
  env?: Record<string, string>;
  /** stdio: JSON payload on stdin; argv: message passed through args */
  protocol?: 'stdio' | 'argv';
  /** Exit codes meaning the invocation itself was rejected (default [2]) */
  clientExitCodes?: number[];
  /** Grace period between SIGTERM and SIGKILL (default 5000) */
  killGraceMs?: number;
}

export interface RunnableBackendConfig {
  type: 'runnable';
  runnable: Runnable;
}

export type BackendType = BackendConfig['type'];
export type { BackendClient };
