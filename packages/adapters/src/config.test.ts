import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { CliAgentAdapter } from './cli/index.js';
import { AdapterConfig, loadAdapter } from './config.js';
import { RunnableAdapter } from './runnable/index.js';
import { WebhookAdapter } from './webhook/index.js';

describe('loadAdapter', () => {
  it('builds a webhook adapter', () => {
    const adapter = loadAdapter({
      adapter: 'webhook',
      webhookUrl: 'https://workflows.test/webhook/a',
      headers: { 'X-Api-Key': 'test-key' },
      payloadTemplate: { source: 'relay' },
    });

    expect(adapter).toBeInstanceOf(WebhookAdapter);
    expect(adapter.name).toBe('webhook');
    expect(adapter.supportsAsyncTasks()).toBe(false);
  });

  it('builds an n8n preset', () => {
    const adapter = loadAdapter({ adapter: 'n8n', webhookUrl: 'https://workflows.test/webhook/b' });

    expect(adapter).toBeInstanceOf(WebhookAdapter);
    expect(adapter.name).toBe('n8n');
  });

  it('builds a CLI adapter', () => {
    const adapter = loadAdapter({ adapter: 'cli', command: 'agent-cli', protocol: 'argv', args: ['{message}'] });

    expect(adapter).toBeInstanceOf(CliAgentAdapter);
    expect(adapter.supportsAsyncTasks()).toBe(true);
  });

  it('builds a runnable adapter from an object with invoke()', () => {
    const adapter = loadAdapter({
      adapter: 'runnable',
      runnable: { invoke: async () => 'ok' },
      name: 'chain',
    });

    expect(adapter).toBeInstanceOf(RunnableAdapter);
    expect(adapter.name).toBe('chain');
  });

  it('rejects unknown adapter kinds', () => {
    expect(() => loadAdapter({ adapter: 'carrier-pigeon' })).toThrow(ZodError);
  });

  it('rejects invalid fields', () => {
    expect(() => loadAdapter({ adapter: 'webhook', webhookUrl: 'not a url' })).toThrow(ZodError);
    expect(() => loadAdapter({ adapter: 'cli', command: '' })).toThrow(ZodError);
    expect(() => loadAdapter({ adapter: 'runnable', runnable: {} })).toThrow('runnable must have an invoke() method');
  });

  it('keeps numeric dispatch settings', () => {
    const parsed = AdapterConfig.parse({
      adapter: 'webhook',
      webhookUrl: 'https://workflows.test/webhook/c',
      timeoutMs: 5_000,
      maxRetries: 4,
      backoffMs: 100,
    });

    expect(parsed).toMatchObject({ timeoutMs: 5_000, maxRetries: 4, backoffMs: 100 });
  });
});
