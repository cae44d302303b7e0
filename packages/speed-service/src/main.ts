#!/usr/bin/env node
/**
 * Speed worker process entry.
 *
 * Exits 1 if the worker cannot start or loses its broker connection, so a
 * supervisor can restart it.
 */

import { errorMessage } from '@speed-rpc/broker-rpc';
import { SpeedWorkerApp } from './app/speed-worker-app.js';
import { buildServiceConfig } from './config.js';

async function main(): Promise<void> {
  const app = new SpeedWorkerApp({ config: buildServiceConfig() });
  const { logger } = app;

  try {
    await app.start();
  } catch (err) {
    logger.fatal({ error: errorMessage(err) }, 'Speed worker could not start');
    process.exit(1);
  }

  app.on('connection_lost', () => {
    app.stop().then(
      () => process.exit(1),
      (err: unknown) => {
        logger.error({ error: errorMessage(err) }, 'Error during shutdown');
        process.exit(1);
      },
    );
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');
    try {
      await app.stop();
      process.exit(0);
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
