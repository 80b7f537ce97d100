import dotenv from 'dotenv';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '..', '..', '..');
dotenv.config({ path: resolve(PROJECT_ROOT, '.env') });

const envSchema = z.object({
  PORT: z.string().regex(/^\d+$/, 'PORT must be a number').default('8080'),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  RELAY_CONFIG: z.string().default('relay.config.json'),
  PUBLIC_URL: z.string().url().optional(),
  TASK_RETENTION_MS: z.string().regex(/^\d+$/, 'TASK_RETENTION_MS must be a number').default('600000'),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  isDev: boolean;
  isProd: boolean;
  /** Relay config file, resolved against the working directory */
  relayConfigPath: string;
  /** Advertised agent URL when the card does not set one */
  publicUrl: string;
  taskRetentionMs: number;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): ServerConfig {
  const env = envSchema.parse(source);
  const port = parseInt(env.PORT, 10);
  const host = env.HOST;

  return {
    port,
    host,
    logLevel: env.LOG_LEVEL,
    isDev: env.NODE_ENV === 'development',
    isProd: env.NODE_ENV === 'production',
    relayConfigPath: resolve(process.cwd(), env.RELAY_CONFIG),
    publicUrl: env.PUBLIC_URL ?? `http://${host === '0.0.0.0' ? 'localhost' : host}:${port}/`,
    taskRetentionMs: parseInt(env.TASK_RETENTION_MS, 10),
  };
}
