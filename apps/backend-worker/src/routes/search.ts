import type { Logger } from '@shopsense/logger';
import type { SemanticSearchService } from '@shopsense/pim';
import type { ProductSearchResponse, SimilarProductsResponse } from '@shopsense/types';
import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

import { successEnvelope } from '../http/responses.js';
import { recordSearch, searchCacheHitTotal, searchCacheMissTotal } from '../otel/metrics.js';
import { normalizeSearchQuery, type SearchCache } from '../processors/search/cache.js';

export type SearchApi = Pick<SemanticSearchService, 'search' | 'getSimilarProducts' | 'resolveTopK'>;

type SearchRoutesOptions = Readonly<{
  search: SearchApi;
  cache: SearchCache | null;
  logger: Logger;
}>;

const LimitSchema = z.coerce.number().int().optional();

const SearchQuerySchema = z.object({
  q: z.string().default(''),
  limit: LimitSchema,
  tenantId: z.string().uuid().optional(),
  shopId: z.string().uuid().optional(),
});

const SimilarParamsSchema = z.object({
  productId: z.string().uuid(),
});

const SimilarQuerySchema = z.object({
  limit: LimitSchema,
});

export const searchRoutes: FastifyPluginAsync<SearchRoutesOptions> = (
  server: FastifyInstance,
  opts
): Promise<void> => {
  const { search, cache, logger } = opts;

  server.get('/products/search', async (request, reply) => {
    const startedAt = Date.now();
    const params = SearchQuerySchema.parse(request.query);
    const query = normalizeSearchQuery(params.q);
    const topK = search.resolveTopK(params.limit);
    const cacheKey = {
      query,
      topK,
      tenantId: params.tenantId ?? null,
      shopId: params.shopId ?? null,
    };

    const cachedResults = cache ? await cache.get(cacheKey) : null;
    if (cache?.enabled) {
      (cachedResults ? searchCacheHitTotal : searchCacheMissTotal).add(1);
    }

    const results =
      cachedResults ??
      (await search.search({
        query,
        topK,
        tenantId: cacheKey.tenantId,
        shopId: cacheKey.shopId,
      }));
    if (!cachedResults && cache) {
      await cache.set(cacheKey, results);
    }

    const searchTimeMs = Date.now() - startedAt;
    recordSearch('search', searchTimeMs / 1000);
    logger.debug(
      { requestId: request.id, topK, results: results.length, cached: cachedResults !== null },
      'Product search served'
    );

    const data: ProductSearchResponse = {
      results,
      query,
      searchTimeMs,
      cached: cachedResults !== null,
    };
    return reply.status(200).send(successEnvelope(request.id, data));
  });

  server.get('/products/:productId/similar', async (request, reply) => {
    const startedAt = Date.now();
    const { productId } = SimilarParamsSchema.parse(request.params);
    const { limit } = SimilarQuerySchema.parse(request.query);

    const results = await search.getSimilarProducts({ productId, topK: limit });
    recordSearch('similar', (Date.now() - startedAt) / 1000);

    const data: SimilarProductsResponse = { results, productId };
    return reply.status(200).send(successEnvelope(request.id, data));
  });

  return Promise.resolve();
};
