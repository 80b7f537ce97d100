import { z } from 'zod';
import { ProtocolMessage } from './message.js';
import { ErrorPayload, TaskState } from './types.js';

/**
 * Task - read-only view of a long-running backend invocation.
 *
 * `result` is present only once `completed`, `error` only once `failed`.
 */
export const Task = z.object({
  id: z.string(),
  state: TaskState,
  correlationId: z.string(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  result: ProtocolMessage.optional(),
  error: ErrorPayload.optional(),
});

export type Task = z.infer<typeof Task>;

export const TERMINAL_TASK_STATES: readonly TaskState[] = ['completed', 'failed', 'canceled'];

export function isTerminalState(state: TaskState): boolean {
  return TERMINAL_TASK_STATES.includes(state);
}
