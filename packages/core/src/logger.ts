import pino from 'pino';

export type Logger = pino.Logger;

/**
 * Named logger for library code. Level comes from LOG_LEVEL.
 */
export function createLogger(name: string): Logger {
  return pino({ name, level: process.env.LOG_LEVEL ?? 'info' });
}
