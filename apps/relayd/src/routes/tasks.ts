import type { TaskManager } from '@a2a-relay/core';
import type { FastifyInstance } from 'fastify';

export async function taskRoutes(app: FastifyInstance, tasks: TaskManager) {
  // Poll a task
  app.get<{ Params: { id: string } }>('/tasks/:id', async (request, reply) => {
    return reply.send({ task: tasks.get(request.params.id) });
  });

  app.post<{ Params: { id: string } }>('/tasks/:id/cancel', async (request, reply) => {
    return reply.send({ task: tasks.cancel(request.params.id) });
  });

  // Forget a finished task
  app.delete<{ Params: { id: string } }>('/tasks/:id', async (request, reply) => {
    tasks.delete(request.params.id);
    return reply.status(204).send();
  });
}
