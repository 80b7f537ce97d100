// Adapter contract
export { BaseAgentAdapter, replyContextId } from './base.js';
export type { AgentAdapter, BackendRequest, BaseAdapterOptions, HandleOptions } from './base.js';

// Translation
export {
  DEFAULT_MESSAGE_FIELD,
  DEFAULT_RESULT_KEYS,
  buildWebhookPayload,
  extractMessageText,
  extractResultText,
  isRecord,
  latestUserText,
  toAssistantMessage,
} from './translate.js';
export type { WebhookPayloadOptions } from './translate.js';

// Backends
export * from './runtime/index.js';

// Webhook adapter
export { WebhookAdapter, WEBHOOK_DEFAULTS, createN8nAdapter } from './webhook/index.js';
export type { WebhookAdapterOptions } from './webhook/index.js';

// CLI adapter
export { CliAgentAdapter, CLI_DEFAULTS } from './cli/index.js';
export type { CliAgentAdapterOptions } from './cli/index.js';

// Runnable adapter
export { RunnableAdapter, RUNNABLE_DEFAULTS, runnableOutputText } from './runnable/index.js';
export type { RunnableAdapterOptions } from './runnable/index.js';

// Configuration
export {
  AdapterConfig,
  WebhookAdapterConfig,
  N8nAdapterConfig,
  CliAdapterConfig,
  RunnableAdapterConfig,
  loadAdapter,
} from './config.js';
export type { AdapterKind, LoadAdapterOptions } from './config.js';
