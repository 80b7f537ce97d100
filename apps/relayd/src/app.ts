import { randomUUID } from 'crypto';

import type { AgentAdapter } from '@a2a-relay/adapters';
import { TaskManager } from '@a2a-relay/core';
import type { AgentCard } from '@a2a-relay/protocol';
import Fastify, { type FastifyInstance } from 'fastify';
import type pino from 'pino';

import { registerErrorHandler } from './errors.js';
import { createAppLogger } from './logger.js';
import { correlationContext, correlationMiddleware } from './middleware/index.js';
import { registerRoutes } from './routes/index.js';

export interface AppOptions {
  adapter: AgentAdapter;
  card: AgentCard;
  /** Defaults to a manager that runs tasks through the adapter */
  tasks?: TaskManager;
  taskRetentionMs?: number;
  logger?: pino.Logger;
}

/**
 * Build the relay server. Closing the app cancels live tasks and releases
 * the adapter's backend client.
 */
export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const { adapter, card } = options;
  const logger = options.logger ?? createAppLogger({ level: 'info' });
  const tasks = options.tasks ?? new TaskManager(
    (params, context) => adapter.handle(params, {
      signal: context.signal,
      correlationId: context.correlationId,
    }),
    { retentionMs: options.taskRetentionMs, logger: logger.child({ component: 'tasks' }) },
  );

  const app = Fastify({
    logger: false,
    genReqId: () => randomUUID(),
  });

  // Correlation ID middleware
  app.addHook('onRequest', correlationMiddleware);
  app.addHook('preHandler', correlationContext);

  // Request logging
  app.addHook('onResponse', async (request, reply) => {
    logger.info({
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
    }, 'Request completed');
  });

  app.addHook('onClose', async () => {
    tasks.close();
    await adapter.close();
    logger.info({ adapter: adapter.name }, 'Adapter closed');
  });

  registerErrorHandler(app, logger);

  // Health check
  app.get('/health', async () => {
    return {
      status: 'ok',
      adapter: adapter.name,
      timestamp: new Date().toISOString(),
    };
  });

  await registerRoutes(app, { adapter, card, tasks });

  return app;
}
