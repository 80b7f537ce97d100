import type { Logger } from '@a2a-relay/core';
import type { MessageSendParams, ProtocolMessage } from '@a2a-relay/protocol';

import { type BackendRequest, BaseAgentAdapter, replyContextId } from '../base.js';
import {
  DEFAULT_RESULT_KEYS,
  buildWebhookPayload,
  extractResultText,
  latestUserText,
  toAssistantMessage,
} from '../translate.js';

/**
 * Webhook Adapter Configuration
 */
export interface WebhookAdapterOptions {
  /** Webhook URL the payload is posted to */
  webhookUrl: string;
  name?: string;
  method?: 'POST' | 'PUT';
  /** Per-attempt timeout (default 30s) */
  timeoutMs?: number;
  /** Retries after the first attempt on 5xx or no response (default 2) */
  maxRetries?: number;
  /** Base backoff; doubles each retry (default 250ms) */
  backoffMs?: number;
  /** Extra headers, e.g. webhook auth */
  headers?: Record<string, string>;
  correlationHeader?: string;
  /** Static fields added to every payload */
  payloadTemplate?: Record<string, unknown>;
  /** Payload field carrying the message text (default "message") */
  messageField?: string;
  /** Response keys searched for the reply text, in order */
  resultKeys?: string[];
  asyncTasks?: boolean;
  logger?: Logger;
}

export const WEBHOOK_DEFAULTS = {
  timeoutMs: 30_000,
  maxRetries: 2,
  backoffMs: 250,
} as const;

/**
 * Webhook Adapter
 *
 * Exposes a workflow engine webhook (n8n, Make, Zapier-style catch hooks)
 * as an agent. The latest user message is posted as
 * `{ message, metadata: { session_id, context } }` and the reply is read
 * from the `output`, `result` or `message` field of the response.
 */
export class WebhookAdapter extends BaseAgentAdapter {
  private readonly messageField?: string;
  private readonly payloadTemplate?: Record<string, unknown>;
  private readonly resultKeys: readonly string[];

  constructor(options: WebhookAdapterOptions) {
    super({
      name: options.name ?? 'webhook',
      backend: { type: 'http', url: options.webhookUrl, method: options.method },
      timeoutMs: options.timeoutMs ?? WEBHOOK_DEFAULTS.timeoutMs,
      maxRetries: options.maxRetries ?? WEBHOOK_DEFAULTS.maxRetries,
      backoffMs: options.backoffMs ?? WEBHOOK_DEFAULTS.backoffMs,
      headers: options.headers,
      correlationHeader: options.correlationHeader,
      asyncTasks: options.asyncTasks ?? false,
      logger: options.logger,
    });
    this.messageField = options.messageField;
    this.payloadTemplate = options.payloadTemplate;
    this.resultKeys = options.resultKeys ?? DEFAULT_RESULT_KEYS;
  }

  protected toBackend(params: MessageSendParams): BackendRequest {
    return {
      text: latestUserText(params),
      payload: buildWebhookPayload(params, {
        messageField: this.messageField,
        template: this.payloadTemplate,
      }),
    };
  }

  protected fromBackend(body: unknown, params: MessageSendParams): ProtocolMessage {
    return toAssistantMessage(extractResultText(body, this.resultKeys), replyContextId(params));
  }
}

/**
 * Create a webhook adapter preset for n8n workflows
 */
export function createN8nAdapter(options: WebhookAdapterOptions): WebhookAdapter {
  return new WebhookAdapter({ ...options, name: options.name ?? 'n8n' });
}
