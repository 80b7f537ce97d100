import { buildApp } from './app.js';
import { loadRelayConfig } from './agent-config.js';
import { loadConfig } from './config.js';
import { createAppLogger } from './logger.js';

const config = loadConfig();
const logger = createAppLogger({ level: config.logLevel, pretty: config.isDev });

async function start() {
  const { card, adapter } = await loadRelayConfig(config.relayConfigPath, {
    defaultUrl: config.publicUrl,
    logger,
  });
  const app = await buildApp({ adapter, card, logger, taskRetentionMs: config.taskRetentionMs });

  // Graceful shutdown
  let shuttingDown = false;
  async function shutdown(signal: string) {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down...');
    await app.close();
    logger.info('Shutdown complete');
  }

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port: config.port, host: config.host });
  logger.info({ adapter: adapter.name, agent: card.name }, `relayd running on http://${config.host}:${config.port}`);
}

start().catch((err: unknown) => {
  logger.error({ err }, 'Failed to start server');
  process.exit(1);
});
