import {
  AdapterClosedError,
  CallFailure,
  CanceledError,
  InvalidStateError,
  NotFoundError,
  toErrorPayload,
} from '@a2a-relay/core';
import type { ErrorPayload } from '@a2a-relay/protocol';
import type { FastifyInstance } from 'fastify';
import type pino from 'pino';
import { ZodError } from 'zod';

/** Client closed request; the caller gave up before the backend answered */
export const STATUS_CANCELED = 499;

export interface HttpError {
  status: number;
  payload: ErrorPayload;
}

/**
 * Map a thrown value onto the HTTP response the relay sends for it.
 */
export function toHttpError(error: unknown): HttpError {
  if (error instanceof ZodError) {
    return {
      status: 400,
      payload: {
        code: 'VALIDATION_ERROR',
        message: error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; '),
        retryable: false,
        details: { issues: error.issues },
      },
    };
  }
  if (error instanceof NotFoundError) {
    return { status: 404, payload: error.toPayload() };
  }
  if (error instanceof InvalidStateError) {
    return { status: 409, payload: error.toPayload() };
  }
  if (error instanceof CallFailure) {
    return { status: 502, payload: error.toPayload() };
  }
  if (error instanceof CanceledError) {
    return { status: STATUS_CANCELED, payload: error.toPayload() };
  }
  if (error instanceof AdapterClosedError) {
    return { status: 503, payload: error.toPayload() };
  }

  // Framework errors such as malformed JSON bodies carry their own 4xx status
  const status = frameworkStatus(error);
  if (status !== undefined) {
    return {
      status,
      payload: { code: 'BAD_REQUEST', message: error instanceof Error ? error.message : String(error), retryable: false },
    };
  }

  return { status: 500, payload: toErrorPayload(error) };
}

export function registerErrorHandler(app: FastifyInstance, logger: pino.Logger): void {
  app.setErrorHandler((error, request, reply) => {
    const { status, payload } = toHttpError(error);
    if (status >= 500) {
      logger.error({ err: error, method: request.method, url: request.url }, 'Request failed');
    }
    return reply.status(status).send({ error: payload });
  });
}

function frameworkStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('statusCode' in error)) {
    return undefined;
  }
  const { statusCode } = error;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500 ? statusCode : undefined;
}
