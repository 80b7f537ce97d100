import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

import type { FastifyReply, FastifyRequest, HookHandlerDoneFunction } from 'fastify';

export const CORRELATION_HEADER = 'x-correlation-id';

export const correlationStorage = new AsyncLocalStorage<string>();

export function getCorrelationId(): string | undefined {
  return correlationStorage.getStore();
}

/**
 * onRequest hook: adopt the caller's correlation id (or mint one), echo it
 * back and enter its storage context.
 */
export function correlationMiddleware(
  request: FastifyRequest,
  reply: FastifyReply,
  done: HookHandlerDoneFunction,
): void {
  const header = request.headers[CORRELATION_HEADER];
  const correlationId = typeof header === 'string' && header.length > 0 ? header : randomUUID();
  request.correlationId = correlationId;
  reply.header(CORRELATION_HEADER, correlationId);
  correlationStorage.enterWith(correlationId);
  done();
}

/**
 * preHandler hook: re-enter the request's context once the body has been
 * parsed, so handlers and their log lines see the id.
 */
export function correlationContext(
  request: FastifyRequest,
  _reply: FastifyReply,
  done: HookHandlerDoneFunction,
): void {
  correlationStorage.enterWith(request.correlationId);
  done();
}

declare module 'fastify' {
  interface FastifyRequest {
    correlationId: string;
  }
}
