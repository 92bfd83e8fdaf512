import { EmbeddingsDisabledError, type EmbeddingsProvider } from '@shopsense/ai-engine';
import type { Logger } from '@shopsense/logger';
import {
  PLATFORM_SCOPE,
  type BulkReindexResult,
  type CatalogRepository,
  type EmbeddingJobQueue,
  type EmbeddingStatistics,
  type EmbeddingStore,
  type ProductEmbeddingCount,
} from '@shopsense/types';

export const DEFAULT_OUTDATED_BATCH_SIZE = 100;
export const DEFAULT_EMBEDDING_COUNTS_LIMIT = 100;

export type EmbeddingReindexServiceDeps = Readonly<{
  catalog: CatalogRepository;
  store: EmbeddingStore;
  provider: EmbeddingsProvider;
  queue: EmbeddingJobQueue;
  logger: Logger;
  enabled: boolean;
  now?: () => Date;
}>;

export type BulkReindexFilter = Readonly<{
  tenantId?: string;
  shopId?: string;
}>;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${name}: ${value}`);
  }
}

/**
 * Operator-facing maintenance: bulk and staged re-embedding, statistics and backend
 * connectivity. Re-embedding only enqueues jobs; the embedding worker does the work.
 */
export class EmbeddingReindexService {
  private readonly catalog: CatalogRepository;
  private readonly store: EmbeddingStore;
  private readonly provider: EmbeddingsProvider;
  private readonly queue: EmbeddingJobQueue;
  private readonly logger: Logger;
  private readonly enabled: boolean;
  private readonly now: () => Date;

  public constructor(deps: EmbeddingReindexServiceDeps) {
    this.catalog = deps.catalog;
    this.store = deps.store;
    this.provider = deps.provider;
    this.queue = deps.queue;
    this.logger = deps.logger;
    this.enabled = deps.enabled;
    this.now = deps.now ?? (() => new Date());
  }

  /** Enqueues generation for every active, published product matching the filter. */
  public triggerBulkReindex(
    filter: BulkReindexFilter = {},
    signal?: AbortSignal
  ): Promise<BulkReindexResult> {
    this.logger.info(
      { tenantId: filter.tenantId ?? null, shopId: filter.shopId ?? null },
      'Starting bulk reindex'
    );

    return this.enqueueAll(
      'Bulk reindex',
      () =>
        this.catalog.listProductIds(
          { ...filter, activeOnly: true, publishedOnly: true },
          PLATFORM_SCOPE,
          signal
        ),
      signal
    );
  }

  /** Enqueues generation for products embedded with an older model version. */
  public reindexOutdatedEmbeddings(
    batchSize: number = DEFAULT_OUTDATED_BATCH_SIZE,
    signal?: AbortSignal
  ): Promise<BulkReindexResult> {
    assertPositiveInteger('batchSize', batchSize);
    const currentVersion = this.provider.model.version;
    this.logger.info({ currentVersion, batchSize }, 'Starting reindex of outdated embeddings');

    return this.enqueueAll(
      'Outdated reindex',
      () => this.store.getProductsNeedingEmbedding(currentVersion, batchSize, signal),
      signal
    );
  }

  public async getStatistics(signal?: AbortSignal): Promise<EmbeddingStatistics> {
    const model = this.provider.model;
    const [stats, productsNeedingEmbedding] = await Promise.all([
      this.store.getStatistics(model.version, signal),
      this.catalog.countProductsNeedingEmbedding(PLATFORM_SCOPE, signal),
    ]);

    return {
      ...stats,
      currentModelName: model.name,
      currentModelVersion: model.version,
      productsNeedingEmbedding,
    };
  }

  public getEmbeddingCounts(
    limit: number = DEFAULT_EMBEDDING_COUNTS_LIMIT,
    signal?: AbortSignal
  ): Promise<ProductEmbeddingCount[]> {
    assertPositiveInteger('limit', limit);
    return this.store.getEmbeddingCounts(limit, signal);
  }

  public testConnection(signal?: AbortSignal): Promise<boolean> {
    return this.provider.testConnection(signal);
  }

  private async enqueueAll(
    label: string,
    listProductIds: () => Promise<string[]>,
    signal: AbortSignal | undefined
  ): Promise<BulkReindexResult> {
    if (!this.enabled) throw new EmbeddingsDisabledError();

    const startedAt = this.now();
    const errors: string[] = [];
    let totalProducts = 0;
    let jobsEnqueued = 0;

    try {
      const productIds = await listProductIds();
      totalProducts = productIds.length;
      this.logger.info({ count: totalProducts }, `${label}: found products`);

      for (const productId of productIds) {
        signal?.throwIfAborted();
        try {
          await this.queue.enqueue(
            {
              productId,
              operation: 'generate',
              triggeredBy: 'reindex',
              requestedAt: this.now().getTime(),
              changeType: 'bulk_reindex',
            },
            signal
          );
          jobsEnqueued += 1;
        } catch (error) {
          if (signal?.aborted) throw error;
          this.logger.error({ productId, error }, `${label}: failed to enqueue job`);
          errors.push(`Failed to enqueue job for ${productId}: ${errorMessage(error)}`);
        }
      }
    } catch (error) {
      if (signal?.aborted) throw error;
      this.logger.error({ error }, `${label} failed`);
      errors.push(`${label} failed: ${errorMessage(error)}`);
    }

    const completedAt = this.now();
    const result: BulkReindexResult = {
      success: errors.length === 0,
      totalProducts,
      jobsEnqueued,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startedAt.getTime(),
      errors,
    };

    this.logger.info(
      { jobsEnqueued, totalProducts, durationMs: result.durationMs },
      `${label}: jobs enqueued`
    );
    return result;
  }
}
