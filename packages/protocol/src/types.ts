import { z } from 'zod';

// Protocol version advertised on agent cards
export const PROTOCOL_VERSION = 'a2a/0.2';

// ID prefixes
export const ID_PREFIXES = {
  message: 'msg_',
  context: 'ctx_',
  task: 'task_',
} as const;

// Message roles
export const Role = z.enum(['user', 'assistant', 'system']);
export type Role = z.infer<typeof Role>;

// Task lifecycle states
export const TaskState = z.enum([
  'submitted',
  'working',
  'completed',
  'failed',
  'canceled',
]);

export type TaskState = z.infer<typeof TaskState>;

// Error payload
export const ErrorPayload = z.object({
  code: z.string(),
  message: z.string(),
  retryable: z.boolean(),
  details: z.record(z.unknown()).optional(),
});

export type ErrorPayload = z.infer<typeof ErrorPayload>;

// ID generators
export function generateId(prefix: keyof typeof ID_PREFIXES): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 10);
  return `${ID_PREFIXES[prefix]}${timestamp}${random}`;
}

export function generateMessageId(): string {
  return generateId('message');
}

export function generateContextId(): string {
  return generateId('context');
}
