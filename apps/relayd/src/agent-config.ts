import { readFile } from 'fs/promises';

import { type AgentAdapter, loadAdapter } from '@a2a-relay/adapters';
import { AgentCard } from '@a2a-relay/protocol';
import type pino from 'pino';
import { z } from 'zod';

/**
 * Relay config file: the public card and the adapter behind it.
 * The adapter block is validated by `loadAdapter`.
 */
const RelayFileConfig = z.object({
  card: z.record(z.unknown()),
  adapter: z.record(z.unknown()),
});

export interface RelaySetup {
  card: AgentCard;
  adapter: AgentAdapter;
}

export interface RelaySetupOptions {
  /** Card URL used when the file does not set one */
  defaultUrl: string;
  logger?: pino.Logger;
}

export function parseRelayConfig(raw: unknown, options: RelaySetupOptions): RelaySetup {
  const file = RelayFileConfig.parse(raw);
  return {
    card: AgentCard.parse({ url: options.defaultUrl, ...file.card }),
    adapter: loadAdapter(file.adapter, { logger: options.logger }),
  };
}

export async function loadRelayConfig(path: string, options: RelaySetupOptions): Promise<RelaySetup> {
  const text = await readFile(path, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(`Relay config ${path} is not valid JSON`, { cause: error });
  }
  return parseRelayConfig(raw, options);
}
