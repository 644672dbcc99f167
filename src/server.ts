/**
 * Adapter pipeline backend entrypoint
 *
 * Run: npx tsx src/server.ts
 */

import 'dotenv/config';
import { buildApp } from './app.js';
import { env } from './config/env.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { ensureIndexes } from './db/indexes.js';
import { InMemoryDatasetCatalog } from './modules/training/storage/dataset.catalog.js';
import { seedDatasetCatalog } from './modules/training/storage/dataset.seed.js';

async function main(): Promise<void> {
  const { app, container } = await buildApp(env);

  if (env.STORAGE_DRIVER === 'mongo') {
    await connectMongo(env.MONGO_URL, env.MONGO_DB, app.log);
    await ensureIndexes(app.log);
  } else {
    app.log.warn('[Server] STORAGE_DRIVER=memory, state is lost on restart');
    if (env.DATASET_SEED_FILE && container.datasets instanceof InMemoryDatasetCatalog) {
      const count = await seedDatasetCatalog(container.datasets, env.DATASET_SEED_FILE);
      app.log.info({ count, file: env.DATASET_SEED_FILE }, '[Server] Dataset catalog seeded');
    }
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    app.log.info(`[Server] Received ${signal}, shutting down...`);
    await container.worker.stop();
    await app.close();
    if (env.STORAGE_DRIVER === 'mongo') await disconnectMongo(app.log);
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: env.PORT, host: '0.0.0.0' });

  if (env.WORKER_ENABLED) {
    container.worker.start();
  }
}

main().catch((err: unknown) => {
  console.error('[Server] Fatal startup error:', err);
  process.exit(1);
});
