import { z } from 'zod';
import { Role, generateMessageId } from './types.js';

/**
 * Text content part. Inbound parts may omit `kind`.
 */
export const TextPart = z.object({
  kind: z.literal('text').default('text'),
  text: z.string(),
  metadata: z.record(z.unknown()).optional(),
});

export type TextPart = z.infer<typeof TextPart>;

/**
 * Structured content part
 */
export const DataPart = z.object({
  kind: z.literal('data'),
  data: z.record(z.unknown()),
  metadata: z.record(z.unknown()).optional(),
});

export type DataPart = z.infer<typeof DataPart>;

export const Part = z.union([TextPart, DataPart]);
export type Part = z.infer<typeof Part>;

/**
 * ProtocolMessage - a single turn exchanged at the system boundary.
 *
 * Content is either a plain string or an ordered list of typed parts.
 * Parsed messages are frozen.
 */
export const ProtocolMessage = z.object({
  messageId: z.string().optional(),
  role: Role,
  content: z.union([z.string(), z.array(Part).readonly()]),
  contextId: z.string().optional(),
}).readonly();

export type ProtocolMessage = z.infer<typeof ProtocolMessage>;

/**
 * Parameters of a message/send call after normalization.
 */
export const MessageSendParams = z.object({
  messages: z.array(ProtocolMessage),
  sessionId: z.string().optional(),
  context: z.unknown().optional(),
});

export type MessageSendParams = z.infer<typeof MessageSendParams>;

/**
 * Wire shape of a message/send call: either a single `message` or a `messages` history.
 */
export const MessageSendRequest = z.object({
  message: ProtocolMessage.optional(),
  messages: z.array(ProtocolMessage).optional(),
  sessionId: z.string().optional(),
  context: z.unknown().optional(),
}).refine(
  (req) => req.message !== undefined || req.messages !== undefined,
  { message: 'Either message or messages is required' },
).transform((req): MessageSendParams => ({
  messages: [...(req.messages ?? []), ...(req.message ? [req.message] : [])],
  sessionId: req.sessionId,
  context: req.context,
}));

export type MessageSendRequest = z.input<typeof MessageSendRequest>;

export interface MessageInput {
  role: Role;
  content: string | Part[];
  messageId?: string;
  contextId?: string;
}

/**
 * Create a frozen ProtocolMessage with a generated id
 */
export function createMessage(input: MessageInput): ProtocolMessage {
  const content = typeof input.content === 'string'
    ? input.content
    : Object.freeze(input.content.map((part) => Object.freeze({ ...part })));

  return Object.freeze({
    messageId: input.messageId ?? generateMessageId(),
    role: input.role,
    content,
    ...(input.contextId !== undefined ? { contextId: input.contextId } : {}),
  });
}

/**
 * Create a text-only message
 */
export function textMessage(role: Role, text: string, contextId?: string): ProtocolMessage {
  return createMessage({ role, content: [{ kind: 'text', text }], contextId });
}

/**
 * Validate a message against the schema
 */
export function validateMessage(message: unknown): ProtocolMessage {
  return ProtocolMessage.parse(message);
}

/**
 * Parse a wire-level message/send body into normalized params
 */
export function parseSendRequest(body: unknown): MessageSendParams {
  return MessageSendRequest.parse(body);
}

export function isTextPart(part: Part): part is TextPart {
  return part.kind === 'text';
}
