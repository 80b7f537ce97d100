import type { Logger } from '@a2a-relay/core';
import { z } from 'zod';

import type { AgentAdapter } from './base.js';
import { CliAgentAdapter } from './cli/index.js';
import { RunnableAdapter } from './runnable/index.js';
import type { Runnable } from './runtime/types.js';
import { WebhookAdapter, createN8nAdapter } from './webhook/index.js';

const Headers = z.record(z.string());

const DispatchFields = {
  name: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  maxRetries: z.number().int().optional(),
  backoffMs: z.number().nonnegative().optional(),
  asyncTasks: z.boolean().optional(),
};

export const WebhookAdapterConfig = z.object({
  adapter: z.literal('webhook'),
  webhookUrl: z.string().url(),
  method: z.enum(['POST', 'PUT']).optional(),
  headers: Headers.optional(),
  correlationHeader: z.string().min(1).optional(),
  payloadTemplate: z.record(z.unknown()).optional(),
  messageField: z.string().min(1).optional(),
  resultKeys: z.array(z.string()).nonempty().optional(),
  ...DispatchFields,
});

export const N8nAdapterConfig = WebhookAdapterConfig.extend({
  adapter: z.literal('n8n'),
});

export const CliAdapterConfig = z.object({
  adapter: z.literal('cli'),
  command: z.string().min(1),
  args: z.array(z.string()).optional(),
  cwd: z.string().optional(),
  env: z.record(z.string()).optional(),
  protocol: z.enum(['stdio', 'argv']).optional(),
  clientExitCodes: z.array(z.number().int()).optional(),
  killGraceMs: z.number().int().nonnegative().optional(),
  ...DispatchFields,
});

function isRunnable(value: unknown): value is Runnable {
  return typeof value === 'object'
    && value !== null
    && 'invoke' in value
    && typeof value.invoke === 'function';
}

export const RunnableAdapterConfig = z.object({
  adapter: z.literal('runnable'),
  runnable: z.custom<Runnable>(isRunnable, { message: 'runnable must have an invoke() method' }),
  inputKey: z.string().min(1).optional(),
  ...DispatchFields,
});

/**
 * Adapter configuration - discriminated union on `adapter`
 */
export const AdapterConfig = z.discriminatedUnion('adapter', [
  WebhookAdapterConfig,
  N8nAdapterConfig,
  CliAdapterConfig,
  RunnableAdapterConfig,
]);

export type AdapterConfig = z.infer<typeof AdapterConfig>;
export type AdapterKind = AdapterConfig['adapter'];

export interface LoadAdapterOptions {
  logger?: Logger;
}

/**
 * Validate an adapter configuration and build the adapter it describes.
 */
export function loadAdapter(config: unknown, options: LoadAdapterOptions = {}): AgentAdapter {
  const parsed = AdapterConfig.parse(config);

  switch (parsed.adapter) {
    case 'webhook': {
      const { adapter: _kind, ...rest } = parsed;
      return new WebhookAdapter({ ...rest, logger: options.logger });
    }

    case 'n8n': {
      const { adapter: _kind, ...rest } = parsed;
      return createN8nAdapter({ ...rest, logger: options.logger });
    }

    case 'cli': {
      const { adapter: _kind, ...rest } = parsed;
      return new CliAgentAdapter({ ...rest, logger: options.logger });
    }

    case 'runnable': {
      const { adapter: _kind, ...rest } = parsed;
      return new RunnableAdapter({ ...rest, logger: options.logger });
    }
  }
}
