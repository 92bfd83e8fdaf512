import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { EmbeddingsDisabledError } from '@shopsense/ai-engine';
import type { BulkReindexResult, EmbeddingStatistics, ProductEmbeddingCount } from '@shopsense/types';

import {
  buildTestServer,
  PRODUCT_ID,
  SAMPLE_REINDEX_RESULT,
  SAMPLE_STATISTICS,
  SHOP_ID,
  StubEmbeddingsAdmin,
  type ErrorBody,
  type SuccessBody,
} from '../../__tests__/helpers/stubs.js';

type StatsData = Readonly<{
  statistics: EmbeddingStatistics;
  products: ProductEmbeddingCount[];
}>;

type HealthData = Readonly<{
  status: string;
  model: string;
  modelVersion: number;
  dimensions: number;
}>;

void describe('POST /embeddings/reindex', () => {
  void it('starts a bulk reindex for the given filter', async () => {
    const embeddings = new StubEmbeddingsAdmin();
    const server = await buildTestServer({ embeddings });

    const res = await server.inject({
      method: 'POST',
      url: '/embeddings/reindex',
      payload: { shopId: SHOP_ID },
    });

    assert.equal(res.statusCode, 202);
    assert.deepEqual(res.json<SuccessBody<BulkReindexResult>>().data, SAMPLE_REINDEX_RESULT);
    assert.deepEqual(embeddings.bulkFilters, [{ shopId: SHOP_ID }]);

    await server.close();
  });

  void it('accepts a request without a body', async () => {
    const embeddings = new StubEmbeddingsAdmin();
    const server = await buildTestServer({ embeddings });

    const res = await server.inject({ method: 'POST', url: '/embeddings/reindex' });

    assert.equal(res.statusCode, 202);
    assert.deepEqual(embeddings.bulkFilters, [{}]);

    await server.close();
  });

  void it('rejects unknown body fields', async () => {
    const embeddings = new StubEmbeddingsAdmin();
    const server = await buildTestServer({ embeddings });

    const res = await server.inject({
      method: 'POST',
      url: '/embeddings/reindex',
      payload: { shop: SHOP_ID },
    });

    assert.equal(res.statusCode, 400);
    assert.equal(res.json<ErrorBody>().error.code, 'VALIDATION_ERROR');
    assert.equal(embeddings.bulkFilters.length, 0);

    await server.close();
  });

  void it('answers 409 when embedding generation is disabled', async () => {
    const embeddings = new StubEmbeddingsAdmin();
    embeddings.failure = new EmbeddingsDisabledError();
    const server = await buildTestServer({ embeddings });

    const res = await server.inject({ method: 'POST', url: '/embeddings/reindex', payload: {} });

    assert.equal(res.statusCode, 409);
    const body = res.json<ErrorBody>();
    assert.equal(body.error.code, 'EMBEDDINGS_DISABLED');
    assert.equal(body.error.message, 'EMBEDDINGS_DISABLED: embedding generation is turned off');

    await server.close();
  });
});

void describe('POST /embeddings/reindex-outdated', () => {
  void it('passes the batch size through', async () => {
    const embeddings = new StubEmbeddingsAdmin();
    const server = await buildTestServer({ embeddings });

    const res = await server.inject({
      method: 'POST',
      url: '/embeddings/reindex-outdated',
      payload: { batchSize: 50 },
    });

    assert.equal(res.statusCode, 202);
    assert.deepEqual(embeddings.outdatedBatchSizes, [50]);

    await server.close();
  });

  void it('leaves the batch size to the service default when omitted', async () => {
    const embeddings = new StubEmbeddingsAdmin();
    const server = await buildTestServer({ embeddings });

    await server.inject({ method: 'POST', url: '/embeddings/reindex-outdated', payload: {} });

    assert.deepEqual(embeddings.outdatedBatchSizes, [undefined]);

    await server.close();
  });

  void it('rejects a batch size below one', async () => {
    const embeddings = new StubEmbeddingsAdmin();
    const server = await buildTestServer({ embeddings });

    const res = await server.inject({
      method: 'POST',
      url: '/embeddings/reindex-outdated',
      payload: { batchSize: 0 },
    });

    assert.equal(res.statusCode, 400);
    assert.equal(res.json<ErrorBody>().error.code, 'VALIDATION_ERROR');
    assert.equal(embeddings.outdatedBatchSizes.length, 0);

    await server.close();
  });
});

void describe('GET /embeddings/stats', () => {
  void it('returns statistics and per-product chunk counts', async () => {
    const embeddings = new StubEmbeddingsAdmin();
    const server = await buildTestServer({ embeddings });

    const res = await server.inject({ method: 'GET', url: '/embeddings/stats?limit=5' });

    assert.equal(res.statusCode, 200);
    const body = res.json<SuccessBody<StatsData>>();
    assert.deepEqual(body.data.statistics, SAMPLE_STATISTICS);
    assert.deepEqual(body.data.products, [{ productId: PRODUCT_ID, chunkCount: 2, activeChunks: 2 }]);
    assert.deepEqual(embeddings.countLimits, [5]);

    await server.close();
  });
});

void describe('GET /embeddings/health', () => {
  void it('reports the configured model when the backend is reachable', async () => {
    const server = await buildTestServer();

    const res = await server.inject({ method: 'GET', url: '/embeddings/health' });

    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json<SuccessBody<HealthData>>().data, {
      status: 'ok',
      model: 'embeddinggemma',
      modelVersion: 2,
      dimensions: 768,
    });

    await server.close();
  });

  void it('answers 503 when the backend is unreachable', async () => {
    const embeddings = new StubEmbeddingsAdmin();
    embeddings.connected = false;
    const server = await buildTestServer({ embeddings });

    const res = await server.inject({ method: 'GET', url: '/embeddings/health' });

    assert.equal(res.statusCode, 503);
    assert.equal(res.json<SuccessBody<HealthData>>().data.status, 'unavailable');

    await server.close();
  });
});
