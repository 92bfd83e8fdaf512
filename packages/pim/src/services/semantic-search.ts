/**
 * Semantic search
 *
 * Query-time façade over the embedding store. Several chunks of one product can
 * match a query, so raw matches are fetched with headroom, deduplicated per product
 * (best chunk wins) and truncated to `topK`. When deduplication leaves fewer than
 * `topK` products the raw window is doubled until the store runs dry or the
 * configured cap is reached.
 */

import { z } from 'zod';

import { EmbeddingUpstreamError, type EmbeddingsProvider } from '@shopsense/ai-engine';
import { withSpan, type Logger } from '@shopsense/logger';
import type {
  EmbeddingSearchMatch,
  EmbeddingStore,
  EmbeddingVector,
  ProductSearchRequest,
  ProductSearchResult,
  SimilarProductsRequest,
} from '@shopsense/types';

export const MAX_QUERY_LENGTH = 1000;
export const DEFAULT_SNIPPET_LENGTH = 200;

const ELLIPSIS = '...';

export type SearchInputErrorCode = 'SEARCH_QUERY_TOO_LONG' | 'SEARCH_INVALID_TOP_K';

export class SearchInputError extends Error {
  public override readonly name = 'SearchInputError';

  public constructor(
    public readonly code: SearchInputErrorCode,
    detail: string
  ) {
    super(`${code}: ${detail}`);
  }
}

export type SemanticSearchOptions = Readonly<{
  defaultTopK: number;
  maxTopK: number;
  /** Raw matches requested per wanted product on the first pass. */
  headroomMultiplier: number;
  maxRawMatches: number;
  snippetLength?: number;
}>;

export type SemanticSearchDeps = Readonly<{
  store: EmbeddingStore;
  provider: EmbeddingsProvider;
  logger: Logger;
  options: SemanticSearchOptions;
}>;

type Filters = Readonly<{ tenantId?: string | null; shopId?: string | null }>;

const PayloadSchema = z.object({
  name: z.string().catch(''),
  shopName: z.string().nullable().catch(null),
  categoryName: z.string().nullable().catch(null),
  price: z.number().catch(0),
  isInStock: z.boolean().catch(false),
  isOnSale: z.boolean().catch(false),
  sku: z.string().nullable().catch(null),
});

type DisplayPayload = z.infer<typeof PayloadSchema>;

const EMPTY_PAYLOAD: DisplayPayload = {
  name: '',
  shopName: null,
  categoryName: null,
  price: 0,
  isInStock: false,
  isOnSale: false,
  sku: null,
};

function readPayload(raw: unknown): DisplayPayload {
  let value = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch {
      return EMPTY_PAYLOAD;
    }
  }
  const parsed = PayloadSchema.safeParse(value);
  return parsed.success ? parsed.data : EMPTY_PAYLOAD;
}

export function truncateSnippet(text: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, Math.max(0, maxLength - ELLIPSIS.length))}${ELLIPSIS}`;
}

/** Best-scoring match per product, ordered by score descending. */
export function dedupeByProduct(
  matches: readonly EmbeddingSearchMatch[],
  excludeProductId?: string
): EmbeddingSearchMatch[] {
  const best = new Map<string, EmbeddingSearchMatch>();
  for (const match of matches) {
    const productId = match.embedding.productId;
    if (productId === excludeProductId) continue;
    const current = best.get(productId);
    if (!current || match.similarityScore > current.similarityScore) {
      best.set(productId, match);
    }
  }
  return [...best.values()].sort((a, b) => b.similarityScore - a.similarityScore);
}

export class SemanticSearchService {
  private readonly store: EmbeddingStore;
  private readonly provider: EmbeddingsProvider;
  private readonly logger: Logger;
  private readonly options: SemanticSearchOptions;

  public constructor(deps: SemanticSearchDeps) {
    this.store = deps.store;
    this.provider = deps.provider;
    this.logger = deps.logger;
    this.options = deps.options;
  }

  public resolveTopK(requested: number | undefined): number {
    if (requested === undefined) return this.options.defaultTopK;
    if (!Number.isInteger(requested) || requested < 1) {
      throw new SearchInputError(
        'SEARCH_INVALID_TOP_K',
        `topK must be a positive integer, got ${requested}`
      );
    }
    return Math.min(requested, this.options.maxTopK);
  }

  public async search(
    request: ProductSearchRequest,
    signal?: AbortSignal
  ): Promise<ProductSearchResult[]> {
    const query = request.query.trim();
    if (!query) return [];
    if (query.length > MAX_QUERY_LENGTH) {
      throw new SearchInputError(
        'SEARCH_QUERY_TOO_LONG',
        `query exceeds ${MAX_QUERY_LENGTH} characters`
      );
    }
    const topK = this.resolveTopK(request.topK);

    return withSpan('search.products', { 'search.top_k': topK }, async (span) => {
      const vector = await this.provider.generateEmbedding(query, signal);
      if (vector.length === 0) {
        throw new EmbeddingUpstreamError(
          'SEARCH_EMBEDDING_EMPTY: backend returned an empty query vector'
        );
      }

      const matches = await this.collect(
        vector,
        topK,
        { tenantId: request.tenantId ?? null, shopId: request.shopId ?? null },
        topK * this.options.headroomMultiplier,
        undefined,
        signal
      );

      span.setAttribute('search.results', matches.length);
      this.logger.debug({ topK, results: matches.length }, 'Semantic search completed');
      return matches.map((match) => this.toResult(match));
    });
  }

  /** Products closest to the reference product's primary chunk, excluding itself. */
  public async getSimilarProducts(
    request: SimilarProductsRequest,
    signal?: AbortSignal
  ): Promise<ProductSearchResult[]> {
    const topK = this.resolveTopK(request.topK);

    const attributes = { 'product.id': request.productId, 'search.top_k': topK };
    return withSpan('search.similar', attributes, async () => {
      const chunks = await this.store.getByProduct(request.productId, signal);
      const primary = chunks.find((chunk) => chunk.chunkIndex === 0) ?? chunks[0];
      if (!primary) {
        this.logger.debug({ productId: request.productId }, 'Reference product has no embeddings');
        return [];
      }

      const matches = await this.collect(
        primary.embedding,
        topK,
        {},
        (topK + 1) * this.options.headroomMultiplier,
        request.productId,
        signal
      );
      return matches.map((match) => this.toResult(match));
    });
  }

  private async collect(
    vector: EmbeddingVector,
    topK: number,
    filters: Filters,
    initialRawMatches: number,
    excludeProductId: string | undefined,
    signal: AbortSignal | undefined
  ): Promise<EmbeddingSearchMatch[]> {
    const cap = Math.max(this.options.maxRawMatches, initialRawMatches);
    let requested = initialRawMatches;

    for (;;) {
      const raw = await this.store.searchSimilar(
        {
          vector,
          topK: requested,
          tenantId: filters.tenantId,
          shopId: filters.shopId,
          activeOnly: true,
        },
        signal
      );
      const products = dedupeByProduct(raw, excludeProductId);

      if (products.length >= topK || raw.length < requested || requested >= cap) {
        return products.slice(0, topK);
      }

      this.logger.debug(
        { requested, products: products.length, topK },
        'Too few distinct products after deduplication, widening search'
      );
      requested = Math.min(requested * 2, cap);
    }
  }

  private toResult(match: EmbeddingSearchMatch): ProductSearchResult {
    const payload = readPayload(match.embedding.payload);
    return {
      productId: match.embedding.productId,
      shopId: match.embedding.shopId,
      relevanceScore: match.similarityScore,
      productName: payload.name,
      shopName: payload.shopName,
      categoryName: payload.categoryName,
      price: payload.price,
      isInStock: payload.isInStock,
      isOnSale: payload.isOnSale,
      sku: payload.sku,
      matchedSnippet: truncateSnippet(
        match.embedding.chunkText,
        this.options.snippetLength ?? DEFAULT_SNIPPET_LENGTH
      ),
    };
  }
}
