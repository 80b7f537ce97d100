import type { AgentAdapter } from '@a2a-relay/adapters';
import type { TaskManager } from '@a2a-relay/core';
import type { AgentCard } from '@a2a-relay/protocol';
import type { FastifyInstance } from 'fastify';

import { agentCardRoutes } from './agent-card.js';
import { messageRoutes } from './messages.js';
import { taskRoutes } from './tasks.js';

export interface RouteDeps {
  adapter: AgentAdapter;
  card: AgentCard;
  tasks: TaskManager;
}

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps) {
  await agentCardRoutes(app, deps.card, deps.adapter);
  await messageRoutes(app, deps);
  await taskRoutes(app, deps.tasks);
}
