import 'dotenv/config';

import { loadEnv } from '@shopsense/config';
import { createLogger } from '@shopsense/logger';
import { closeWorkers } from '@shopsense/queue-manager';

import { buildServer } from './http/server.js';
import { startEmbeddingWorker } from './processors/embeddings/worker.js';
import { startProductEventsWorker } from './processors/product-events/worker.js';
import { createContainer } from './runtime/container.js';

const env = loadEnv();
const logger = createLogger({
  service: 'backend-worker',
  env: env.nodeEnv,
  level: env.logLevel,
});

const container = createContainer(env, logger);

const server = await buildServer({
  nodeEnv: env.nodeEnv,
  logger,
  search: container.search,
  embeddings: container.reindex,
  model: container.provider.model,
  searchCache: container.searchCache,
  checkDatabase: container.checkDatabase,
});

const workers = [
  startEmbeddingWorker({
    config: container.queueConfig,
    pipeline: container.pipeline,
    searchCache: container.searchCache,
    logger,
    concurrency: env.embeddingWorkerConcurrency,
  }),
  startProductEventsWorker({
    config: container.queueConfig,
    dispatcher: container.dispatcher,
    logger,
  }),
];
logger.info(
  { enabled: env.enableEmbeddingGeneration, model: env.embeddingModel, store: env.embeddingStore },
  'embedding workers started'
);

const shutdown = async (signal: string): Promise<void> => {
  logger.info({ signal }, 'shutdown started');
  try {
    await server.close();
    await closeWorkers(workers);
    logger.info({ signal }, 'workers stopped');
    await container.close();
    logger.info({ signal }, 'shutdown complete');
  } catch (error) {
    logger.error({ error, signal }, 'shutdown failed');
    process.exitCode = 1;
  }
};

try {
  await server.listen({ port: env.port, host: '0.0.0.0' });
  logger.info({ port: env.port }, 'server listening');
} catch (error) {
  logger.fatal({ error }, 'server failed to start');
  process.exitCode = 1;
  await shutdown('startup_failure');
}

process.once('SIGTERM', () => void shutdown('SIGTERM'));
process.once('SIGINT', () => void shutdown('SIGINT'));
