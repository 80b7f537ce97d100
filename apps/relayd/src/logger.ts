import pino from 'pino';

import { getCorrelationId } from './middleware/correlation.js';

export interface AppLoggerOptions {
  level: pino.LevelWithSilent;
  /** Human-readable output through pino-pretty */
  pretty?: boolean;
  /** Write JSON lines here instead of stdout; ignored when pretty */
  destination?: pino.DestinationStream;
}

/**
 * Server logger. Every line logged while a request is in flight carries
 * that request's correlation id.
 */
export function createAppLogger(options: AppLoggerOptions): pino.Logger {
  const destination = options.pretty ? undefined : options.destination;
  return pino({
    name: 'relayd',
    level: options.level,
    mixin() {
      const correlationId = getCorrelationId();
      return correlationId ? { correlationId } : {};
    },
    transport: options.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
          },
        }
      : undefined,
  }, destination);
}
