/**
 * HTTP server entry point.
 *
 * Loads configuration from the environment, opens storage, optionally
 * seeds demo data and serves the app with @hono/node-server.
 */

import { serve } from '@hono/node-server';
import { createExpenseApp } from './app.js';
import { createAuthConfig } from './auth/config.js';
import { loadConfig, type StorageSettings } from './config.js';
import { CategoryService } from './core/category-service.js';
import { getLogger } from './logging.js';
import { startMetricsServer } from './metrics.js';
import { MemoryStorage } from './storage/memory-storage.js';
import { seedDemoData } from './storage/seed.js';
import { SqliteStorage } from './storage/sqlite-storage.js';
import type { WorkflowStorage } from './storage/storage-interface.js';

function createStorage(settings: StorageSettings): WorkflowStorage {
  return settings.kind === 'sqlite'
    ? new SqliteStorage({ dbPath: settings.dbPath })
    : new MemoryStorage();
}

async function main(): Promise<void> {
  const logger = getLogger();
  const config = loadConfig();

  const storage = createStorage(config.storage);
  await storage.initialize();

  if (config.seedDemoData) {
    const seeded = await seedDemoData(storage, new CategoryService(storage));
    logger.info(seeded, 'Demo data seeded');
  }

  const app = createExpenseApp({
    storage,
    policy: config.policy,
    auth: createAuthConfig(config.jwt),
  });
  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info(
      { port: info.port, storage: config.storage.kind, auth: config.jwt !== null },
      'Expense workflow server listening'
    );
  });

  const metricsServer =
    config.metricsPort !== undefined ? startMetricsServer(config.metricsPort) : null;

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down');
    await new Promise<void>((resolve, reject) => {
      server.close((err?: Error) => (err ? reject(err) : resolve()));
    });
    await metricsServer?.close();
    await storage.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  getLogger().fatal({ err }, 'Failed to start server');
  process.exit(1);
});
