import type { EmbeddingModel } from '@shopsense/ai-engine';
import type { Logger } from '@shopsense/logger';
import type { EmbeddingReindexService } from '@shopsense/pim';
import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

import { successEnvelope } from '../http/responses.js';

export type EmbeddingsAdminApi = Pick<
  EmbeddingReindexService,
  | 'triggerBulkReindex'
  | 'reindexOutdatedEmbeddings'
  | 'getStatistics'
  | 'getEmbeddingCounts'
  | 'testConnection'
>;

type EmbeddingsRoutesOptions = Readonly<{
  embeddings: EmbeddingsAdminApi;
  model: EmbeddingModel;
  logger: Logger;
}>;

const MAX_BATCH_SIZE = 1000;

const ReindexBodySchema = z
  .object({
    tenantId: z.string().uuid().optional(),
    shopId: z.string().uuid().optional(),
  })
  .strict();

const ReindexOutdatedBodySchema = z
  .object({
    batchSize: z.number().int().min(1).max(MAX_BATCH_SIZE).optional(),
  })
  .strict();

const StatsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_BATCH_SIZE).optional(),
});

export const embeddingsRoutes: FastifyPluginAsync<EmbeddingsRoutesOptions> = (
  server: FastifyInstance,
  opts
): Promise<void> => {
  const { embeddings, model, logger } = opts;

  server.post('/embeddings/reindex', async (request, reply) => {
    const filter = ReindexBodySchema.parse(request.body ?? {});
    const result = await embeddings.triggerBulkReindex(filter);

    logger.info(
      { requestId: request.id, jobsEnqueued: result.jobsEnqueued, errors: result.errors.length },
      'Bulk reindex requested'
    );
    return reply.status(202).send(successEnvelope(request.id, result));
  });

  server.post('/embeddings/reindex-outdated', async (request, reply) => {
    const { batchSize } = ReindexOutdatedBodySchema.parse(request.body ?? {});
    const result = await embeddings.reindexOutdatedEmbeddings(batchSize);

    logger.info(
      { requestId: request.id, jobsEnqueued: result.jobsEnqueued, errors: result.errors.length },
      'Outdated reindex requested'
    );
    return reply.status(202).send(successEnvelope(request.id, result));
  });

  server.get('/embeddings/stats', async (request, reply) => {
    const { limit } = StatsQuerySchema.parse(request.query);
    const [statistics, products] = await Promise.all([
      embeddings.getStatistics(),
      embeddings.getEmbeddingCounts(limit),
    ]);
    return reply.status(200).send(successEnvelope(request.id, { statistics, products }));
  });

  server.get('/embeddings/health', async (request, reply) => {
    const connected = await embeddings.testConnection();
    const data = {
      status: connected ? 'ok' : 'unavailable',
      model: model.name,
      modelVersion: model.version,
      dimensions: model.dimensions,
    } as const;
    return reply.status(connected ? 200 : 503).send(successEnvelope(request.id, data));
  });

  return Promise.resolve();
};
