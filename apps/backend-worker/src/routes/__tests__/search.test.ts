import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { EmbeddingUpstreamError } from '@shopsense/ai-engine';
import { createSilentLogger } from '@shopsense/logger';
import type { PipelineOutcome } from '@shopsense/pim';
import type { ProductSearchResponse, SimilarProductsResponse } from '@shopsense/types';

import {
  buildTestServer,
  MemoryCacheClient,
  PRODUCT_ID,
  SAMPLE_RESULT,
  SHOP_ID,
  StubSearch,
  type ErrorBody,
  type SuccessBody,
} from '../../__tests__/helpers/stubs.js';
import { createEmbeddingJobProcessor } from '../../processors/embeddings/worker.js';
import { SearchCache } from '../../processors/search/cache.js';

void describe('GET /products/search', () => {
  void it('returns search results in a success envelope', async () => {
    const search = new StubSearch();
    const server = await buildTestServer({ search });

    const res = await server.inject({
      method: 'GET',
      url: `/products/search?q=desk%20lamp&limit=5&shopId=${SHOP_ID}`,
      headers: { 'x-request-id': 'req-123' },
    });

    assert.equal(res.statusCode, 200);
    assert.equal(res.headers['x-request-id'], 'req-123');
    const body = res.json<SuccessBody<ProductSearchResponse>>();
    assert.equal(body.success, true);
    assert.equal(body.meta.request_id, 'req-123');
    assert.deepEqual(body.data.results, [SAMPLE_RESULT]);
    assert.equal(body.data.query, 'desk lamp');
    assert.equal(body.data.cached, false);
    assert.deepEqual(search.searches, [
      { query: 'desk lamp', topK: 5, tenantId: null, shopId: SHOP_ID },
    ]);

    await server.close();
  });

  void it('serves a repeated query from the cache', async () => {
    const search = new StubSearch();
    const client = new MemoryCacheClient();
    const searchCache = new SearchCache({ client, ttlSeconds: 60, logger: createSilentLogger() });
    const server = await buildTestServer({ search, searchCache });

    const first = await server.inject({ method: 'GET', url: '/products/search?q=Desk%20%20Lamp' });
    const second = await server.inject({ method: 'GET', url: '/products/search?q=Desk%20Lamp' });

    assert.equal(first.json<SuccessBody<ProductSearchResponse>>().data.cached, false);
    const cached = second.json<SuccessBody<ProductSearchResponse>>();
    assert.equal(cached.data.cached, true);
    assert.deepEqual(cached.data.results, [SAMPLE_RESULT]);
    assert.equal(search.searches.length, 1);
    assert.deepEqual([...client.ttls.values()], [60]);

    await server.close();
  });

  void it('embeds and caches the same normalized query', async () => {
    const search = new StubSearch();
    const client = new MemoryCacheClient();
    const searchCache = new SearchCache({ client, ttlSeconds: 60, logger: createSilentLogger() });
    const server = await buildTestServer({ search, searchCache });

    await server.inject({ method: 'GET', url: '/products/search?q=%20Desk%20%20Lamp' });
    const lower = await server.inject({ method: 'GET', url: '/products/search?q=desk%20lamp' });

    assert.equal(lower.json<SuccessBody<ProductSearchResponse>>().data.cached, false);
    assert.deepEqual(
      search.searches.map((request) => request.query),
      ['Desk Lamp', 'desk lamp']
    );

    await server.close();
  });

  void it('stops serving a product once its embeddings are deactivated', async () => {
    const search = new StubSearch();
    const client = new MemoryCacheClient();
    const searchCache = new SearchCache({ client, ttlSeconds: 300, logger: createSilentLogger() });
    const server = await buildTestServer({ search, searchCache });
    const deactivated: PipelineOutcome = { status: 'deactivated', chunks: 2 };
    const processor = createEmbeddingJobProcessor({
      pipeline: { run: () => Promise.resolve(deactivated) },
      searchCache,
      logger: createSilentLogger(),
    });

    const before = await server.inject({ method: 'GET', url: '/products/search?q=lamp' });
    assert.deepEqual(before.json<SuccessBody<ProductSearchResponse>>().data.results, [SAMPLE_RESULT]);

    search.results = [];
    await processor(
      {
        id: 'job-1',
        name: 'embedding.deactivate',
        data: {
          productId: PRODUCT_ID,
          operation: 'deactivate',
          triggeredBy: 'event',
          requestedAt: 1_767_225_600_000,
          changeType: 'unpublished',
        },
        attemptsMade: 0,
      },
      new AbortController().signal
    );

    const after = await server.inject({ method: 'GET', url: '/products/search?q=lamp' });
    const body = after.json<SuccessBody<ProductSearchResponse>>();
    assert.equal(body.data.cached, false);
    assert.deepEqual(body.data.results, []);
    assert.equal(search.searches.length, 2);

    await server.close();
  });

  void it('rejects a non-numeric limit with a validation error', async () => {
    const server = await buildTestServer();

    const res = await server.inject({ method: 'GET', url: '/products/search?q=lamp&limit=abc' });

    assert.equal(res.statusCode, 400);
    const body = res.json<ErrorBody>();
    assert.equal(body.success, false);
    assert.equal(body.error.code, 'VALIDATION_ERROR');

    await server.close();
  });

  void it('maps an invalid topK to SEARCH_INVALID_TOP_K', async () => {
    const server = await buildTestServer();

    const res = await server.inject({ method: 'GET', url: '/products/search?q=lamp&limit=0' });

    assert.equal(res.statusCode, 400);
    const body = res.json<ErrorBody>();
    assert.equal(body.error.code, 'SEARCH_INVALID_TOP_K');
    assert.equal(body.error.message, 'SEARCH_INVALID_TOP_K: topK must be positive, got 0');

    await server.close();
  });

  void it('rejects a shop filter that is not a UUID', async () => {
    const search = new StubSearch();
    const server = await buildTestServer({ search });

    const res = await server.inject({ method: 'GET', url: '/products/search?q=lamp&shopId=shop-1' });

    assert.equal(res.statusCode, 400);
    assert.equal(res.json<ErrorBody>().error.code, 'VALIDATION_ERROR');
    assert.equal(search.searches.length, 0);

    await server.close();
  });

  void it('answers 502 when the embedding backend fails', async () => {
    const search = new StubSearch();
    search.failure = new EmbeddingUpstreamError('EMBEDDING_UPSTREAM: backend unavailable', {
      status: 503,
    });
    const server = await buildTestServer({ search });

    const res = await server.inject({ method: 'GET', url: '/products/search?q=lamp' });

    assert.equal(res.statusCode, 502);
    const body = res.json<ErrorBody>();
    assert.equal(body.error.code, 'EMBEDDING_UPSTREAM_ERROR');
    assert.equal(body.error.message, 'EMBEDDING_UPSTREAM: backend unavailable');

    await server.close();
  });

  void it('hides internal error messages in production', async () => {
    const search = new StubSearch();
    search.failure = new Error('connection refused');
    const server = await buildTestServer({ search, nodeEnv: 'production' });

    const res = await server.inject({ method: 'GET', url: '/products/search?q=lamp' });

    assert.equal(res.statusCode, 500);
    const body = res.json<ErrorBody>();
    assert.equal(body.error.code, 'INTERNAL_SERVER_ERROR');
    assert.equal(body.error.message, 'Internal Server Error');

    await server.close();
  });
});

void describe('GET /products/:productId/similar', () => {
  void it('returns similar products for the reference product', async () => {
    const search = new StubSearch();
    const server = await buildTestServer({ search });

    const res = await server.inject({ method: 'GET', url: `/products/${PRODUCT_ID}/similar?limit=3` });

    assert.equal(res.statusCode, 200);
    const body = res.json<SuccessBody<SimilarProductsResponse>>();
    assert.equal(body.data.productId, PRODUCT_ID);
    assert.deepEqual(body.data.results, [SAMPLE_RESULT]);
    assert.deepEqual(search.similar, [{ productId: PRODUCT_ID, topK: 3 }]);

    await server.close();
  });

  void it('rejects a product id that is not a UUID', async () => {
    const search = new StubSearch();
    const server = await buildTestServer({ search });

    const res = await server.inject({ method: 'GET', url: '/products/lamp-1/similar' });

    assert.equal(res.statusCode, 400);
    assert.equal(res.json<ErrorBody>().error.code, 'VALIDATION_ERROR');
    assert.equal(search.similar.length, 0);

    await server.close();
  });
});

void describe('server', () => {
  void it('answers liveness probes', async () => {
    const server = await buildTestServer();

    const res = await server.inject({ method: 'GET', url: '/health/live' });

    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json<{ status: string }>(), { status: 'alive' });

    await server.close();
  });

  void it('reports readiness from the database check', async () => {
    const ready = await buildTestServer();
    const notReady = await buildTestServer({ databaseOk: false });

    const ok = await ready.inject({ method: 'GET', url: '/health/ready' });
    const failing = await notReady.inject({ method: 'GET', url: '/health/ready' });

    assert.equal(ok.statusCode, 200);
    assert.deepEqual(ok.json(), { status: 'ready', checks: { database: 'ok' } });
    assert.equal(failing.statusCode, 503);
    assert.deepEqual(failing.json(), { status: 'not_ready', checks: { database: 'fail' } });

    await ready.close();
    await notReady.close();
  });

  void it('wraps unknown routes in an error envelope', async () => {
    const server = await buildTestServer();

    const res = await server.inject({ method: 'GET', url: '/nope?x=1' });

    assert.equal(res.statusCode, 404);
    const body = res.json<ErrorBody>();
    assert.equal(body.error.code, 'NOT_FOUND');
    assert.equal(body.error.message, 'Route GET /nope not found');

    await server.close();
  });
});
