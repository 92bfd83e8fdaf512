import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { EmbeddingsDisabledError } from '@shopsense/ai-engine';
import { InMemoryEmbeddingStore } from '@shopsense/database';

import {
  createRecordingLogger,
  FakeCatalogRepository,
  FakeEmbeddingsProvider,
  makeProduct,
  RecordingJobQueue,
  SHOP_ID,
  TENANT_ID,
} from '../../__tests__/helpers/fakes.js';
import { EmbeddingReindexService } from '../embedding-reindex.js';

const P1 = 'aaaaaaaa-0000-4000-8000-000000000001';
const P2 = 'aaaaaaaa-0000-4000-8000-000000000002';
const P3 = 'aaaaaaaa-0000-4000-8000-000000000003';
const OTHER_SHOP = 'bbbbbbbb-0000-4000-8000-000000000001';

function clock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2026, 2, 1, 12, 0, 0, tick++ * 10));
}

function setup(params: { enabled?: boolean; modelVersion?: number } = {}) {
  const catalog = new FakeCatalogRepository([
    makeProduct({ id: P1 }),
    makeProduct({ id: P2, isPublished: false }),
    makeProduct({ id: P3, shopId: OTHER_SHOP, embeddingGenerated: true }),
  ]);
  const store = new InMemoryEmbeddingStore();
  const provider = new FakeEmbeddingsProvider({ version: params.modelVersion ?? 2 });
  const queue = new RecordingJobQueue();
  const service = new EmbeddingReindexService({
    catalog,
    store,
    provider,
    queue,
    logger: createRecordingLogger(),
    enabled: params.enabled ?? true,
    now: clock(),
  });
  return { catalog, store, provider, queue, service };
}

async function seed(store: InMemoryEmbeddingStore, productId: string, version: number, isActive = true) {
  await store.upsert({
    productId,
    tenantId: TENANT_ID,
    shopId: SHOP_ID,
    chunkIndex: 0,
    chunkText: 'Product: Desk Lamp',
    embedding: [1, 0],
    embeddingModel: 'embeddinggemma',
    embeddingVersion: version,
    canonicalDocumentVersion: 1,
    contentHash: 'hash',
    payload: null,
    isActive,
  });
}

void describe('EmbeddingReindexService.triggerBulkReindex', () => {
  void it('enqueues generation for active, published products', async () => {
    const { queue, service } = setup();

    const result = await service.triggerBulkReindex();

    assert.deepEqual(
      queue.jobs.map((job) => [job.productId, job.operation, job.triggeredBy, job.changeType]),
      [
        [P1, 'generate', 'reindex', 'bulk_reindex'],
        [P3, 'generate', 'reindex', 'bulk_reindex'],
      ]
    );
    assert.equal(result.success, true);
    assert.equal(result.totalProducts, 2);
    assert.equal(result.jobsEnqueued, 2);
    assert.equal(result.startedAt, '2026-03-01T12:00:00.000Z');
    assert.deepEqual(result.errors, []);
    assert.equal(result.durationMs, Date.parse(result.completedAt) - Date.parse(result.startedAt));
  });

  void it('honours the shop filter', async () => {
    const { queue, service } = setup();

    const result = await service.triggerBulkReindex({ shopId: OTHER_SHOP });

    assert.equal(result.totalProducts, 1);
    assert.deepEqual(
      queue.jobs.map((job) => job.productId),
      [P3]
    );
  });

  void it('collects enqueue failures per product', async () => {
    const { queue, service } = setup();
    queue.failFor.add(P1);

    const result = await service.triggerBulkReindex();

    assert.equal(result.success, false);
    assert.equal(result.jobsEnqueued, 1);
    assert.deepEqual(result.errors, [`Failed to enqueue job for ${P1}: queue unavailable`]);
  });

  void it('reports a failed product listing in the result', async () => {
    const { catalog, service } = setup();
    catalog.listFailure = new Error('connection reset');

    const result = await service.triggerBulkReindex();

    assert.equal(result.success, false);
    assert.equal(result.totalProducts, 0);
    assert.deepEqual(result.errors, ['Bulk reindex failed: connection reset']);
  });

  void it('refuses to run while generation is disabled', async () => {
    const { queue, service } = setup({ enabled: false });

    await assert.rejects(service.triggerBulkReindex(), EmbeddingsDisabledError);
    assert.deepEqual(queue.jobs, []);
  });
});

void describe('EmbeddingReindexService.reindexOutdatedEmbeddings', () => {
  void it('enqueues products embedded with an older model version', async () => {
    const { store, queue, service } = setup({ modelVersion: 2 });
    await seed(store, P1, 1);
    await seed(store, P2, 2);
    await seed(store, P3, 1);

    const result = await service.reindexOutdatedEmbeddings(1);

    assert.equal(result.totalProducts, 1);
    assert.deepEqual(
      queue.jobs.map((job) => job.productId),
      [P1]
    );
  });

  void it('skips deactivated products so they do not crowd out eligible ones', async () => {
    const { store, queue, service } = setup({ modelVersion: 2 });
    await seed(store, P2, 1, false);
    await seed(store, P1, 1);

    const result = await service.reindexOutdatedEmbeddings(1);

    assert.equal(result.totalProducts, 1);
    assert.deepEqual(
      queue.jobs.map((job) => job.productId),
      [P1]
    );
  });

  void it('rejects a non-positive batch size', () => {
    const { service } = setup();

    assert.throws(() => service.reindexOutdatedEmbeddings(0), /Invalid batchSize: 0/);
  });
});

void describe('EmbeddingReindexService statistics', () => {
  void it('combines store counts with the current model', async () => {
    const { store, service } = setup({ modelVersion: 2 });
    await seed(store, P1, 1);
    await seed(store, P3, 2, false);

    const stats = await service.getStatistics();

    assert.deepEqual(stats, {
      totalEmbeddings: 2,
      activeEmbeddings: 1,
      inactiveEmbeddings: 1,
      uniqueProducts: 2,
      embeddingsByModel: { embeddinggemma: 2 },
      embeddingsByVersion: { '1': 1, '2': 1 },
      outdatedEmbeddings: 1,
      currentModelName: 'embeddinggemma',
      currentModelVersion: 2,
      productsNeedingEmbedding: 1,
    });
  });

  void it('lists per-product chunk counts', async () => {
    const { store, service } = setup();
    await seed(store, P1, 2, false);

    assert.deepEqual(await service.getEmbeddingCounts(), [
      { productId: P1, chunkCount: 1, activeChunks: 0 },
    ]);
  });

  void it('delegates the connectivity check to the provider', async () => {
    const { provider, service } = setup();
    provider.connected = false;

    assert.equal(await service.testConnection(), false);
  });
});
