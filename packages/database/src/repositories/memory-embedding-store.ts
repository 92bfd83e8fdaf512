import { randomUUID } from 'node:crypto';

import type { Logger } from '@shopsense/logger';
import type {
  EmbeddingSearchMatch,
  EmbeddingSearchQuery,
  EmbeddingStore,
  EmbeddingStoreStatistics,
  ProductEmbeddingCount,
  ProductEmbeddingRecord,
  UpsertProductEmbeddingInput,
} from '@shopsense/types';

import { cosineDistance, toSimilarityScore } from '../vector.js';

function chunkKey(productId: string, chunkIndex: number): string {
  return `${productId}:${chunkIndex}`;
}

function countBy(records: readonly ProductEmbeddingRecord[], key: (r: ProductEmbeddingRecord) => string) {
  const counts: Record<string, number> = {};
  for (const record of records) {
    const k = key(record);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}

export type InMemoryEmbeddingStoreOptions = Readonly<{
  now?: () => Date;
  logger?: Logger;
}>;

/**
 * In-process store with the same ordering and filtering rules as {@link PgEmbeddingStore}.
 * Storage order is insertion order; an update keeps the record's position. Records whose
 * dimensionality differs from the query vector are left out of a search.
 */
export class InMemoryEmbeddingStore implements EmbeddingStore {
  private readonly records = new Map<string, ProductEmbeddingRecord>();
  private readonly now: () => Date;
  private readonly logger: Logger | null;

  public constructor(options: InMemoryEmbeddingStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? null;
  }

  public searchSimilar(query: EmbeddingSearchQuery, signal?: AbortSignal): Promise<EmbeddingSearchMatch[]> {
    signal?.throwIfAborted();
    if (query.topK <= 0) return Promise.resolve([]);

    const candidates = this.all()
      .filter((r) => !query.activeOnly || r.isActive)
      .filter((r) => query.tenantId == null || r.tenantId === query.tenantId)
      .filter((r) => query.shopId == null || r.shopId === query.shopId);

    const comparable = candidates.filter((r) => r.embedding.length === query.vector.length);
    if (comparable.length < candidates.length) {
      this.logger?.warn(
        { dimensions: query.vector.length, skipped: candidates.length - comparable.length },
        'Skipping stored embeddings with a different dimensionality'
      );
    }

    const matches = comparable.map((embedding) => {
      const distance = cosineDistance(query.vector, embedding.embedding);
      return { embedding, distance, similarityScore: toSimilarityScore(distance) };
    });

    // Array.prototype.sort is stable: ties keep storage order.
    matches.sort((a, b) => a.distance - b.distance);
    return Promise.resolve(matches.slice(0, Math.trunc(query.topK)));
  }

  public getByProduct(productId: string, signal?: AbortSignal): Promise<ProductEmbeddingRecord[]> {
    signal?.throwIfAborted();
    const chunks = this.all()
      .filter((r) => r.productId === productId)
      .sort((a, b) => a.chunkIndex - b.chunkIndex);
    return Promise.resolve(chunks);
  }

  public upsert(input: UpsertProductEmbeddingInput, signal?: AbortSignal): Promise<ProductEmbeddingRecord> {
    signal?.throwIfAborted();
    const key = chunkKey(input.productId, input.chunkIndex);
    const existing = this.records.get(key);
    const now = this.now();

    const record: ProductEmbeddingRecord = {
      id: existing?.id ?? randomUUID(),
      productId: input.productId,
      tenantId: input.tenantId,
      shopId: input.shopId,
      chunkIndex: input.chunkIndex,
      chunkText: input.chunkText,
      embedding: [...input.embedding],
      embeddingModel: input.embeddingModel,
      embeddingVersion: input.embeddingVersion,
      canonicalDocumentVersion: input.canonicalDocumentVersion,
      contentHash: input.contentHash,
      payload: input.payload,
      isActive: input.isActive,
      generatedAt: now,
      createdAt: existing?.createdAt ?? now,
    };
    this.records.set(key, record);
    return Promise.resolve(record);
  }

  public deleteByProduct(productId: string, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    return Promise.resolve(this.deleteWhere((r) => r.productId === productId));
  }

  public setActive(productId: string, isActive: boolean, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    let changed = 0;
    for (const [key, record] of this.records) {
      if (record.productId !== productId || record.isActive === isActive) continue;
      this.records.set(key, { ...record, isActive });
      changed++;
    }
    return Promise.resolve(changed);
  }

  public pruneChunks(productId: string, keepCount: number, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    return Promise.resolve(
      this.deleteWhere((r) => r.productId === productId && r.chunkIndex >= keepCount)
    );
  }

  public getProductsNeedingEmbedding(
    currentModelVersion: number,
    batchSize: number,
    signal?: AbortSignal
  ): Promise<string[]> {
    signal?.throwIfAborted();
    const productIds = new Set<string>();
    for (const record of this.records.values()) {
      if (productIds.size >= batchSize) break;
      if (record.isActive && record.embeddingVersion < currentModelVersion) {
        productIds.add(record.productId);
      }
    }
    return Promise.resolve([...productIds]);
  }

  public getStatistics(currentModelVersion: number, signal?: AbortSignal): Promise<EmbeddingStoreStatistics> {
    signal?.throwIfAborted();
    const all = this.all();
    const active = all.filter((r) => r.isActive).length;
    return Promise.resolve({
      totalEmbeddings: all.length,
      activeEmbeddings: active,
      inactiveEmbeddings: all.length - active,
      uniqueProducts: new Set(all.map((r) => r.productId)).size,
      embeddingsByModel: countBy(all, (r) => r.embeddingModel),
      embeddingsByVersion: countBy(all, (r) => String(r.embeddingVersion)),
      outdatedEmbeddings: all.filter((r) => r.embeddingVersion < currentModelVersion).length,
    });
  }

  public getEmbeddingCounts(limit: number, signal?: AbortSignal): Promise<ProductEmbeddingCount[]> {
    signal?.throwIfAborted();
    const counts = new Map<string, { chunkCount: number; activeChunks: number }>();
    for (const record of this.records.values()) {
      const entry = counts.get(record.productId) ?? { chunkCount: 0, activeChunks: 0 };
      entry.chunkCount++;
      if (record.isActive) entry.activeChunks++;
      counts.set(record.productId, entry);
    }
    const rows = [...counts.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .slice(0, Math.max(0, limit))
      .map(([productId, entry]) => ({ productId, ...entry }));
    return Promise.resolve(rows);
  }

  private all(): ProductEmbeddingRecord[] {
    return [...this.records.values()];
  }

  private deleteWhere(predicate: (record: ProductEmbeddingRecord) => boolean): number {
    let deleted = 0;
    for (const [key, record] of this.records) {
      if (!predicate(record)) continue;
      this.records.delete(key);
      deleted++;
    }
    return deleted;
  }
}
