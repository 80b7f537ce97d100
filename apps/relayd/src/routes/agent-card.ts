import type { AgentAdapter } from '@a2a-relay/adapters';
import type { AgentCard } from '@a2a-relay/protocol';
import type { FastifyInstance } from 'fastify';

/**
 * Public card with capabilities taken from the adapter rather than the config file.
 */
export function describeAgent(card: AgentCard, adapter: AgentAdapter): AgentCard {
  return {
    ...card,
    capabilities: {
      streaming: adapter.supportsStreaming(),
      asyncTasks: adapter.supportsAsyncTasks(),
    },
  };
}

export async function agentCardRoutes(app: FastifyInstance, card: AgentCard, adapter: AgentAdapter) {
  app.get('/.well-known/agent.json', async (_request, reply) => {
    return reply.send(describeAgent(card, adapter));
  });
}
