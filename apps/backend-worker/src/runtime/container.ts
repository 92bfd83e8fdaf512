import { createEmbeddingsProvider, type EmbeddingsProvider } from '@shopsense/ai-engine';
import type { AppEnv } from '@shopsense/config';
import {
  checkDatabaseConnection,
  closePool,
  createDatabase,
  createDbPool,
  DrizzleCatalogRepository,
  InMemoryEmbeddingStore,
  PgEmbeddingStore,
} from '@shopsense/database';
import type { Logger } from '@shopsense/logger';
import {
  CanonicalDocumentService,
  EmbeddingPipeline,
  EmbeddingReindexService,
  ProductChangeDispatcher,
  SemanticSearchService,
} from '@shopsense/pim';
import {
  configFromEnv,
  createEmbeddingJobQueue,
  createQueue,
  createRedisConnection,
  EMBEDDING_QUEUE_NAME,
  type QueueManagerConfig,
} from '@shopsense/queue-manager';
import type { EmbeddingStore, ProductEmbeddingJobPayload } from '@shopsense/types';

import { SearchCache } from '../processors/search/cache.js';

export type Container = Readonly<{
  queueConfig: QueueManagerConfig;
  provider: EmbeddingsProvider;
  store: EmbeddingStore;
  pipeline: EmbeddingPipeline;
  dispatcher: ProductChangeDispatcher;
  search: SemanticSearchService;
  reindex: EmbeddingReindexService;
  searchCache: SearchCache | null;
  checkDatabase: () => Promise<boolean>;
  /** Releases pools and connections owned by the container. */
  close: () => Promise<void>;
}>;

/** Composition root: wires adapters to services from the loaded environment. */
export function createContainer(env: AppEnv, logger: Logger): Container {
  const pool = createDbPool({ connectionString: env.databaseUrl, poolSize: env.dbPoolSize });
  pool.on('error', (error) => {
    logger.error({ error }, 'PostgreSQL pool error');
  });

  const catalog = new DrizzleCatalogRepository(createDatabase(pool));
  const store: EmbeddingStore =
    env.embeddingStore === 'memory'
      ? new InMemoryEmbeddingStore({ logger: logger.child({ component: 'embedding-store' }) })
      : new PgEmbeddingStore(pool);

  const provider = createEmbeddingsProvider({
    baseUrl: env.ollamaBaseUrl,
    modelName: env.embeddingModel,
    modelVersion: env.embeddingModelVersion,
    dimensions: env.embeddingDimensions,
    timeoutMs: env.embeddingTimeoutMs,
    strictDimensions: env.embeddingStrictDimensions,
    logger,
  });

  const queueConfig = configFromEnv(env);
  const embeddingQueue = createQueue<ProductEmbeddingJobPayload>(
    { config: queueConfig },
    { name: EMBEDDING_QUEUE_NAME }
  );
  const jobQueue = createEmbeddingJobQueue(embeddingQueue);

  const documents = new CanonicalDocumentService({
    catalog,
    logger: logger.child({ component: 'canonical-documents' }),
  });

  const pipeline = new EmbeddingPipeline({
    catalog,
    store,
    provider,
    documents,
    logger: logger.child({ component: 'embedding-pipeline' }),
    options: {
      enabled: env.enableEmbeddingGeneration,
      maxTokensPerChunk: env.embeddingMaxTokensPerChunk,
    },
  });

  const dispatcher = new ProductChangeDispatcher({
    queue: jobQueue,
    logger: logger.child({ component: 'change-dispatcher' }),
    enabled: env.enableEmbeddingGeneration,
  });

  const search = new SemanticSearchService({
    store,
    provider,
    logger: logger.child({ component: 'semantic-search' }),
    options: {
      defaultTopK: env.searchDefaultTopK,
      maxTopK: env.searchMaxTopK,
      headroomMultiplier: env.searchHeadroomMultiplier,
      maxRawMatches: env.searchMaxRawMatches,
    },
  });

  const reindex = new EmbeddingReindexService({
    catalog,
    store,
    provider,
    queue: jobQueue,
    logger: logger.child({ component: 'embedding-reindex' }),
    enabled: env.enableEmbeddingGeneration,
  });

  const cacheRedis =
    env.searchCacheTtlSeconds > 0
      ? createRedisConnection({
          redisUrl: env.redisUrl,
          redisOptions: { lazyConnect: true, maxRetriesPerRequest: 1 },
        })
      : null;
  cacheRedis?.on('error', (error: unknown) => {
    logger.warn({ error }, 'Redis error (search cache)');
  });

  const searchCache = cacheRedis
    ? new SearchCache({
        client: cacheRedis,
        ttlSeconds: env.searchCacheTtlSeconds,
        logger: logger.child({ component: 'search-cache' }),
      })
    : null;

  return {
    queueConfig,
    provider,
    store,
    pipeline,
    dispatcher,
    search,
    reindex,
    searchCache,
    checkDatabase: () => checkDatabaseConnection(pool, logger),
    close: async () => {
      await embeddingQueue.close();
      if (cacheRedis) await cacheRedis.quit();
      await closePool(pool);
    },
  };
}
