import {
  type MessageSendParams,
  type ProtocolMessage,
  isTextPart,
  textMessage,
} from '@a2a-relay/protocol';

export const DEFAULT_MESSAGE_FIELD = 'message';
export const DEFAULT_RESULT_KEYS: readonly string[] = ['output', 'result', 'message'];

export interface WebhookPayloadOptions {
  /** Field the message text is written to */
  messageField?: string;
  /** Static fields merged under the extracted ones */
  template?: Record<string, unknown>;
}

/**
 * Plain-text rendering of a message. Part lists are joined with single
 * spaces; parts without text are skipped.
 */
export function extractMessageText(message: ProtocolMessage): string {
  if (typeof message.content === 'string') {
    return message.content.trim();
  }
  return message.content
    .filter(isTextPart)
    .map((part) => part.text.trim())
    .filter((text) => text.length > 0)
    .join(' ');
}

/**
 * Text of the most recent user message, or '' when there is none.
 */
export function latestUserText(params: MessageSendParams): string {
  for (let i = params.messages.length - 1; i >= 0; i--) {
    const message = params.messages[i];
    if (message?.role === 'user') {
      return extractMessageText(message);
    }
  }
  return '';
}

export function buildWebhookPayload(
  params: MessageSendParams,
  options: WebhookPayloadOptions = {},
): Record<string, unknown> {
  const messageField = options.messageField ?? DEFAULT_MESSAGE_FIELD;
  return {
    ...options.template,
    [messageField]: latestUserText(params),
    metadata: {
      session_id: params.sessionId ?? null,
      context: params.context ?? null,
    },
  };
}

/**
 * Reply text from a backend response body. Never throws: bodies without a
 * known result key are returned whole, pretty-printed.
 */
export function extractResultText(
  output: unknown,
  keys: readonly string[] = DEFAULT_RESULT_KEYS,
): string {
  if (isRecord(output)) {
    for (const key of keys) {
      if (key in output) {
        return stringify(output[key], false);
      }
    }
  }
  return stringify(output, true);
}

export function toAssistantMessage(text: string, contextId?: string): ProtocolMessage {
  return textMessage('assistant', text, contextId);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringify(value: unknown, pretty: boolean): string {
  if (typeof value === 'string') {
    return value;
  }
  try {
    return JSON.stringify(value, null, pretty ? 2 : undefined) ?? String(value);
  } catch {
    // Cyclic or BigInt-bearing values
    return String(value);
  }
}
