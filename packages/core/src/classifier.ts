import { TransportError } from './errors.js';

/**
 * Categories a failed attempt can fall into.
 *
 * `ServerError` is never returned by `classify`: it is the label a
 * transient failure receives once the retry budget is spent.
 */
export const ErrorClass = {
  Transient: 'transient',
  ClientError: 'client_error',
  ServerError: 'server_error',
} as const;

export type ErrorClass = (typeof ErrorClass)[keyof typeof ErrorClass];

export function isSuccessStatus(status: number): boolean {
  return status < 400;
}

/**
 * Classify a failed attempt from its status or thrown error.
 *
 * Returns `undefined` for anything that cannot be reasoned about; the
 * caller must let such errors propagate instead of retrying them.
 */
export function classify(input: number | unknown): ErrorClass | undefined {
  if (typeof input === 'number') {
    if (input >= 400 && input < 500) return ErrorClass.ClientError;
    if (input >= 500) return ErrorClass.Transient;
    return undefined;
  }

  if (input instanceof TransportError) {
    return ErrorClass.Transient;
  }

  return undefined;
}
