import type { AgentAdapter } from '@a2a-relay/adapters';
import type { TaskManager } from '@a2a-relay/core';
import { parseSendRequest } from '@a2a-relay/protocol';
import type { FastifyInstance } from 'fastify';

export interface MessageRouteDeps {
  adapter: AgentAdapter;
  tasks: TaskManager;
}

/**
 * Response side of a request, as far as disconnect detection needs it
 */
export interface ClosableResponse {
  readonly writableEnded: boolean;
  once(event: 'close', listener: () => void): unknown;
}

/**
 * Signal that aborts when the connection closes before the response was
 * written, i.e. the caller went away.
 */
export function abortOnDisconnect(response: ClosableResponse): AbortSignal {
  const controller = new AbortController();
  response.once('close', () => {
    if (!response.writableEnded) {
      controller.abort(new Error('Client disconnected'));
    }
  });
  return controller.signal;
}

export async function messageRoutes(app: FastifyInstance, { adapter, tasks }: MessageRouteDeps) {
  // Send a message; async adapters answer with a task to poll
  app.post('/message/send', async (request, reply) => {
    const params = parseSendRequest(request.body);

    if (adapter.supportsAsyncTasks()) {
      const task = tasks.create(params);
      return reply.status(202).send({ task });
    }

    // x-correlation-id only tags logs; the backend gets a fresh request id per call
    const message = await adapter.handle(params, { signal: abortOnDisconnect(reply.raw) });
    return reply.send({ message });
  });
}
