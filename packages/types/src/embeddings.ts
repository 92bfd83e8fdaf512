import { isCanonicalUuid } from './ids.js';
import { isProductChangeType, type ProductChangeType } from './products.js';

export type EmbeddingVector = readonly number[];

/** Display metadata denormalized onto every chunk of a product. */
export interface ProductEmbeddingPayload {
  productId: string;
  name: string;
  shopId: string;
  shopName: string | null;
  categoryName: string | null;
  price: number;
  isInStock: boolean;
  isOnSale: boolean;
  sku: string | null;
}

export type ProductEmbeddingRecord = Readonly<{
  id: string;
  productId: string;
  tenantId: string | null;
  shopId: string;
  chunkIndex: number;
  chunkText: string;
  embedding: EmbeddingVector;
  embeddingModel: string;
  embeddingVersion: number;
  canonicalDocumentVersion: number;
  contentHash: string;
  /** Stored JSON; may be malformed, readers must tolerate it. */
  payload: unknown;
  isActive: boolean;
  generatedAt: Date;
  createdAt: Date;
}>;

export type UpsertProductEmbeddingInput = Readonly<{
  productId: string;
  tenantId: string | null;
  shopId: string;
  chunkIndex: number;
  chunkText: string;
  embedding: EmbeddingVector;
  embeddingModel: string;
  embeddingVersion: number;
  canonicalDocumentVersion: number;
  contentHash: string;
  payload: ProductEmbeddingPayload | null;
  isActive: boolean;
}>;

export type EmbeddingSearchQuery = Readonly<{
  vector: EmbeddingVector;
  topK: number;
  tenantId?: string | null;
  shopId?: string | null;
  activeOnly: boolean;
}>;

export type EmbeddingSearchMatch = Readonly<{
  embedding: ProductEmbeddingRecord;
  /** Cosine distance in [0, 2]. */
  distance: number;
  /** `1 - distance / 2`. */
  similarityScore: number;
}>;

export type EmbeddingStoreStatistics = Readonly<{
  totalEmbeddings: number;
  activeEmbeddings: number;
  inactiveEmbeddings: number;
  uniqueProducts: number;
  embeddingsByModel: Readonly<Record<string, number>>;
  embeddingsByVersion: Readonly<Record<string, number>>;
  outdatedEmbeddings: number;
}>;

export type ProductEmbeddingCount = Readonly<{
  productId: string;
  chunkCount: number;
  activeChunks: number;
}>;

export interface EmbeddingStore {
  searchSimilar(query: EmbeddingSearchQuery, signal?: AbortSignal): Promise<EmbeddingSearchMatch[]>;
  /** Ordered by chunk index ascending. */
  getByProduct(productId: string, signal?: AbortSignal): Promise<ProductEmbeddingRecord[]>;
  /** Inserts, or updates in place keyed by (productId, chunkIndex). */
  upsert(input: UpsertProductEmbeddingInput, signal?: AbortSignal): Promise<ProductEmbeddingRecord>;
  deleteByProduct(productId: string, signal?: AbortSignal): Promise<number>;
  setActive(productId: string, isActive: boolean, signal?: AbortSignal): Promise<number>;
  /** Deletes chunks with `chunkIndex >= keepCount`. */
  pruneChunks(productId: string, keepCount: number, signal?: AbortSignal): Promise<number>;
  /** Products with an active chunk embedded under an older model version. */
  getProductsNeedingEmbedding(
    currentModelVersion: number,
    batchSize: number,
    signal?: AbortSignal
  ): Promise<string[]>;
  getStatistics(currentModelVersion: number, signal?: AbortSignal): Promise<EmbeddingStoreStatistics>;
  getEmbeddingCounts(limit: number, signal?: AbortSignal): Promise<ProductEmbeddingCount[]>;
}

export const EMBEDDING_OPERATIONS = ['generate', 'delete', 'deactivate', 'activate'] as const;

export type EmbeddingOperation = (typeof EMBEDDING_OPERATIONS)[number];

export type EmbeddingJobTriggeredBy = 'event' | 'reindex' | 'manual';

export interface ProductEmbeddingJobPayload {
  productId: string;
  operation: EmbeddingOperation;
  triggeredBy: EmbeddingJobTriggeredBy;
  requestedAt: number;
  changeType?: ProductChangeType;
}

/** Durable hand-off to the embedding worker; delivery is at-least-once. */
export interface EmbeddingJobQueue {
  enqueue(job: ProductEmbeddingJobPayload, signal?: AbortSignal): Promise<void>;
}

export function isEmbeddingOperation(value: unknown): value is EmbeddingOperation {
  return typeof value === 'string' && (EMBEDDING_OPERATIONS as readonly string[]).includes(value);
}

export function validateProductEmbeddingJobPayload(
  data: unknown
): data is ProductEmbeddingJobPayload {
  if (!data || typeof data !== 'object') return false;
  const job = data as Partial<ProductEmbeddingJobPayload>;

  if (typeof job.productId !== 'string' || !isCanonicalUuid(job.productId)) return false;
  if (!isEmbeddingOperation(job.operation)) return false;
  if (job.triggeredBy !== 'event' && job.triggeredBy !== 'reindex' && job.triggeredBy !== 'manual') {
    return false;
  }
  if (typeof job.requestedAt !== 'number' || !Number.isFinite(job.requestedAt)) return false;
  if (job.changeType !== undefined && !isProductChangeType(job.changeType)) return false;

  return true;
}

export interface EmbeddingStatistics extends EmbeddingStoreStatistics {
  currentModelName: string;
  currentModelVersion: number;
  productsNeedingEmbedding: number;
}

export interface BulkReindexResult {
  success: boolean;
  totalProducts: number;
  jobsEnqueued: number;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  errors: string[];
}
