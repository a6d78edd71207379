import 'reflect-metadata';
import type { Server } from 'http';
import { createApp } from './app.js';
import { config, logConfigSummary } from '@shared/config/index.js';
import { initializeDatabase } from '@shared/db/run-migrations.js';
import { closeDataSource } from '@shared/db/data-source.js';
import { getServices } from '@shared/services/index.js';
import { logger } from '@shared/utils/logger.js';

logConfigSummary();

// Initialize database schema before starting server
await initializeDatabase();

const app = createApp();

const server: Server = app.listen(config.port, () => {
  logger.info(`Microblog API listening on http://localhost:${config.port}`);
});

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  // Let queued emails go out before the process exits
  await getServices().notificationQueue.idle();
  await closeDataSource();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed:', error);
        process.exit(1);
      });
  });
}
