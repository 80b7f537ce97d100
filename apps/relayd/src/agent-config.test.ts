import { WebhookAdapter } from '@a2a-relay/adapters';
import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { parseRelayConfig } from './agent-config.js';
import { loadConfig } from './config.js';

describe('parseRelayConfig', () => {
  it('builds the card and adapter', () => {
    const setup = parseRelayConfig({
      card: { name: 'Orders', skills: [{ id: 'lookup', name: 'Order lookup' }] },
      adapter: { adapter: 'webhook', webhookUrl: 'https://workflows.test/webhook/orders' },
    }, { defaultUrl: 'http://localhost:8080/' });

    expect(setup.adapter).toBeInstanceOf(WebhookAdapter);
    expect(setup.card).toMatchObject({
      name: 'Orders',
      url: 'http://localhost:8080/',
      protocolVersion: 'a2a/0.2',
      skills: [{ id: 'lookup', name: 'Order lookup', tags: [] }],
    });
  });

  it('keeps a card url from the file', () => {
    const setup = parseRelayConfig({
      card: { name: 'Orders', url: 'https://agents.test/orders/' },
      adapter: { adapter: 'cli', command: 'agent-cli' },
    }, { defaultUrl: 'http://localhost:8080/' });

    expect(setup.card.url).toBe('https://agents.test/orders/');
  });

  it('rejects files without an adapter', () => {
    expect(() => parseRelayConfig({ card: { name: 'Orders' } }, { defaultUrl: 'http://localhost:8080/' }))
      .toThrow(ZodError);
  });
});

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      port: 8080,
      host: '0.0.0.0',
      logLevel: 'info',
      isDev: true,
      publicUrl: 'http://localhost:8080/',
      taskRetentionMs: 600_000,
    });
    expect(config.relayConfigPath.endsWith('relay.config.json')).toBe(true);
  });

  it('reads overrides', () => {
    const config = loadConfig({
      PORT: '9090',
      HOST: '127.0.0.1',
      NODE_ENV: 'production',
      LOG_LEVEL: 'warn',
      TASK_RETENTION_MS: '1000',
    });

    expect(config).toMatchObject({
      port: 9090,
      logLevel: 'warn',
      isProd: true,
      isDev: false,
      publicUrl: 'http://127.0.0.1:9090/',
      taskRetentionMs: 1000,
    });
  });

  it('rejects non-numeric ports', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow('PORT must be a number');
  });
});
