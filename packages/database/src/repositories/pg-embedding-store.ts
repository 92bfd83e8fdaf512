import type {
  EmbeddingSearchMatch,
  EmbeddingSearchQuery,
  EmbeddingStore,
  EmbeddingStoreStatistics,
  ProductEmbeddingCount,
  ProductEmbeddingRecord,
  UpsertProductEmbeddingInput,
} from '@shopsense/types';

import { withTransaction, type DatabasePool } from '../db.js';
import { disableIndexScans, getOptimalEfSearch, setHnswEfSearch } from '../tuning/pgvector.js';
import { parsePgVector, toPgVectorLiteral, toSimilarityScore } from '../vector.js';

type EmbeddingRow = Readonly<{
  id: string;
  productId: string;
  tenantId: string | null;
  shopId: string;
  chunkIndex: number;
  chunkText: string;
  embedding: string;
  embeddingModel: string;
  embeddingVersion: number;
  canonicalDocumentVersion: number;
  contentHash: string;
  payload: unknown;
  isActive: boolean;
  generatedAt: Date;
  createdAt: Date;
}>;

type SearchRow = EmbeddingRow & Readonly<{ distance: number | string }>;

type CountRow = Readonly<{ key: string; count: number }>;

type TotalsRow = Readonly<{
  total: number;
  active: number;
  uniqueProducts: number;
  outdated: number;
}>;

const EMBEDDING_COLUMNS = `
  id,
  product_id as "productId",
  tenant_id as "tenantId",
  shop_id as "shopId",
  chunk_index as "chunkIndex",
  chunk_text as "chunkText",
  embedding::text as "embedding",
  embedding_model as "embeddingModel",
  embedding_version as "embeddingVersion",
  canonical_document_version as "canonicalDocumentVersion",
  content_hash as "contentHash",
  payload,
  is_active as "isActive",
  generated_at as "generatedAt",
  created_at as "createdAt"`;

function toRecord(row: EmbeddingRow): ProductEmbeddingRecord {
  return { ...row, embedding: parsePgVector(row.embedding) };
}

const SEARCH_SQL = `SELECT ${EMBEDDING_COLUMNS},
         (embedding <=> $1::vector) as "distance"
    FROM product_embeddings
   WHERE ($2::boolean IS FALSE OR is_active)
     AND ($3::uuid IS NULL OR tenant_id = $3::uuid)
     AND ($4::uuid IS NULL OR shop_id = $4::uuid)
   ORDER BY "distance" ASC, created_at ASC, id ASC
   LIMIT $5`;

/**
 * pgvector-backed store. Distances come from the `<=>` (cosine) operator, which the
 * HNSW index on product_embeddings.embedding serves.
 *
 * A search runs in its own transaction with `hnsw.ef_search` sized to the request. When
 * the index scan comes back short, the query is repeated as an exact scan so that the
 * active/tenant/shop filters never hide rows that a full ranking would return.
 */
export class PgEmbeddingStore implements EmbeddingStore {
  public constructor(private readonly pool: DatabasePool) {}

  public async searchSimilar(
    query: EmbeddingSearchQuery,
    signal?: AbortSignal
  ): Promise<EmbeddingSearchMatch[]> {
    if (query.topK <= 0) return [];
    signal?.throwIfAborted();

    const limit = Math.trunc(query.topK);
    const values = [
      toPgVectorLiteral(query.vector),
      query.activeOnly,
      query.tenantId ?? null,
      query.shopId ?? null,
      limit,
    ];

    const rows = await withTransaction(this.pool, async (connection) => {
      await setHnswEfSearch(connection, getOptimalEfSearch(limit));
      const indexed = await connection.query<SearchRow>(SEARCH_SQL, values);
      if (indexed.rows.length >= limit) return indexed.rows;

      signal?.throwIfAborted();
      await disableIndexScans(connection);
      const exact = await connection.query<SearchRow>(SEARCH_SQL, values);
      return exact.rows;
    });

    return rows.map((row) => {
      const { distance, ...embedding } = row;
      const numericDistance = Number(distance);
      return {
        embedding: toRecord(embedding),
        distance: numericDistance,
        similarityScore: toSimilarityScore(numericDistance),
      };
    });
  }

  public async getByProduct(
    productId: string,
    signal?: AbortSignal
  ): Promise<ProductEmbeddingRecord[]> {
    signal?.throwIfAborted();
    const result = await this.pool.query<EmbeddingRow>(
      `SELECT ${EMBEDDING_COLUMNS}
         FROM product_embeddings
        WHERE product_id = $1
        ORDER BY chunk_index ASC`,
      [productId]
    );
    return result.rows.map(toRecord);
  }

  public async upsert(
    input: UpsertProductEmbeddingInput,
    signal?: AbortSignal
  ): Promise<ProductEmbeddingRecord> {
    signal?.throwIfAborted();
    const result = await this.pool.query<EmbeddingRow>(
      `INSERT INTO product_embeddings (
         product_id,
         tenant_id,
         shop_id,
         chunk_index,
         chunk_text,
         embedding,
         embedding_model,
         embedding_version,
         canonical_document_version,
         content_hash,
         payload,
         is_active,
         generated_at,
         created_at
       )
       VALUES ($1, $2, $3, $4, $5, $6::vector, $7, $8, $9, $10, $11::jsonb, $12, now(), now())
       ON CONFLICT (product_id, chunk_index) DO UPDATE SET
         tenant_id = EXCLUDED.tenant_id,
         shop_id = EXCLUDED.shop_id,
         chunk_text = EXCLUDED.chunk_text,
         embedding = EXCLUDED.embedding,
         embedding_model = EXCLUDED.embedding_model,
         embedding_version = EXCLUDED.embedding_version,
         canonical_document_version = EXCLUDED.canonical_document_version,
         content_hash = EXCLUDED.content_hash,
         payload = EXCLUDED.payload,
         is_active = EXCLUDED.is_active,
         generated_at = now()
       RETURNING ${EMBEDDING_COLUMNS}`,
      [
        input.productId,
        input.tenantId,
        input.shopId,
        input.chunkIndex,
        input.chunkText,
        toPgVectorLiteral(input.embedding),
        input.embeddingModel,
        input.embeddingVersion,
        input.canonicalDocumentVersion,
        input.contentHash,
        input.payload ? JSON.stringify(input.payload) : null,
        input.isActive,
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error(`EMBEDDING_UPSERT_FAILED: no row returned for product ${input.productId}`);
    }
    return toRecord(row);
  }

  public async deleteByProduct(productId: string, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    const result = await this.pool.query(
      `DELETE FROM product_embeddings WHERE product_id = $1`,
      [productId]
    );
    return result.rowCount ?? 0;
  }

  public async setActive(productId: string, isActive: boolean, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    const result = await this.pool.query(
      `UPDATE product_embeddings
          SET is_active = $2
        WHERE product_id = $1
          AND is_active IS DISTINCT FROM $2`,
      [productId, isActive]
    );
    return result.rowCount ?? 0;
  }

  public async pruneChunks(productId: string, keepCount: number, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    const result = await this.pool.query(
      `DELETE FROM product_embeddings
        WHERE product_id = $1
          AND chunk_index >= $2`,
      [productId, keepCount]
    );
    return result.rowCount ?? 0;
  }

  public async getProductsNeedingEmbedding(
    currentModelVersion: number,
    batchSize: number,
    signal?: AbortSignal
  ): Promise<string[]> {
    if (batchSize <= 0) return [];
    signal?.throwIfAborted();
    const result = await this.pool.query<{ productId: string }>(
      `SELECT product_id as "productId"
         FROM product_embeddings
        WHERE embedding_version < $1
          AND is_active
        GROUP BY product_id
        ORDER BY MIN(created_at) ASC, product_id ASC
        LIMIT $2`,
      [currentModelVersion, Math.trunc(batchSize)]
    );
    return result.rows.map((row) => row.productId);
  }

  public async getStatistics(
    currentModelVersion: number,
    signal?: AbortSignal
  ): Promise<EmbeddingStoreStatistics> {
    signal?.throwIfAborted();
    const totals = await this.pool.query<TotalsRow>(
      `SELECT COUNT(*)::int as "total",
              COUNT(*) FILTER (WHERE is_active)::int as "active",
              COUNT(DISTINCT product_id)::int as "uniqueProducts",
              COUNT(*) FILTER (WHERE embedding_version < $1)::int as "outdated"
         FROM product_embeddings`,
      [currentModelVersion]
    );
    signal?.throwIfAborted();
    const byModel = await this.pool.query<CountRow>(
      `SELECT embedding_model as "key", COUNT(*)::int as "count"
         FROM product_embeddings
        GROUP BY embedding_model
        ORDER BY embedding_model`
    );
    signal?.throwIfAborted();
    const byVersion = await this.pool.query<CountRow>(
      `SELECT embedding_version::text as "key", COUNT(*)::int as "count"
         FROM product_embeddings
        GROUP BY embedding_version
        ORDER BY embedding_version`
    );

    const row = totals.rows[0];
    const total = row?.total ?? 0;
    const active = row?.active ?? 0;
    return {
      totalEmbeddings: total,
      activeEmbeddings: active,
      inactiveEmbeddings: total - active,
      uniqueProducts: row?.uniqueProducts ?? 0,
      embeddingsByModel: Object.fromEntries(byModel.rows.map((r) => [r.key, r.count])),
      embeddingsByVersion: Object.fromEntries(byVersion.rows.map((r) => [r.key, r.count])),
      outdatedEmbeddings: row?.outdated ?? 0,
    };
  }

  public async getEmbeddingCounts(limit: number, signal?: AbortSignal): Promise<ProductEmbeddingCount[]> {
    if (limit <= 0) return [];
    signal?.throwIfAborted();
    const result = await this.pool.query<ProductEmbeddingCount>(
      `SELECT product_id as "productId",
              COUNT(*)::int as "chunkCount",
              COUNT(*) FILTER (WHERE is_active)::int as "activeChunks"
         FROM product_embeddings
        GROUP BY product_id
        ORDER BY product_id
        LIMIT $1`,
      [Math.trunc(limit)]
    );
    return result.rows;
  }
}
