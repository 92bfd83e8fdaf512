import { randomUUID } from 'node:crypto';

import type { EmbeddingModel } from '@shopsense/ai-engine';
import type { NodeEnv } from '@shopsense/config';
import { setRequestIdAttribute, type Logger } from '@shopsense/logger';
import Fastify, { type FastifyInstance } from 'fastify';

import { httpActiveRequests, recordHttpRequest } from '../otel/metrics.js';
import type { SearchCache } from '../processors/search/cache.js';
import { embeddingsRoutes, type EmbeddingsAdminApi } from '../routes/embeddings.js';
import { searchRoutes, type SearchApi } from '../routes/search.js';
import { errorEnvelope, toHttpError } from './responses.js';

function withoutQuery(url: string): string {
  const q = url.indexOf('?');
  return q === -1 ? url : url.slice(0, q);
}

export type BuildServerOptions = Readonly<{
  nodeEnv: NodeEnv;
  logger: Logger;
  search: SearchApi;
  embeddings: EmbeddingsAdminApi;
  model: EmbeddingModel;
  searchCache: SearchCache | null;
  checkDatabase: () => Promise<boolean>;
}>;

export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const { logger } = options;

  const server = Fastify({
    trustProxy: true,
    bodyLimit: 1 * 1024 * 1024,
    connectionTimeout: 10_000,
    requestTimeout: 60_000,
    requestIdHeader: 'x-request-id',
    genReqId(req) {
      const header = req.headers['x-request-id'];
      if (typeof header === 'string' && header.trim()) return header.trim();
      return randomUUID();
    },
  });

  const startedAt = new WeakMap<object, bigint>();

  server.addHook('onRequest', async (request, reply) => {
    reply.header('x-request-id', request.id);

    // Correlate request id with the current OTel span (when tracing is active)
    setRequestIdAttribute(request.id);

    httpActiveRequests.add(1);
    startedAt.set(request, process.hrtime.bigint());

    logger.debug(
      { requestId: request.id, method: request.method, path: withoutQuery(request.url) },
      'request received'
    );
  });

  server.addHook('onResponse', async (request, reply) => {
    httpActiveRequests.add(-1);

    const startNs = startedAt.get(request);
    const durationSeconds =
      startNs === undefined ? 0 : Number(process.hrtime.bigint() - startNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? withoutQuery(request.url);
    recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);

    logger.info(
      {
        requestId: request.id,
        method: request.method,
        path: withoutQuery(request.url),
        statusCode: reply.statusCode,
        durationMs: Math.round(durationSeconds * 1000),
      },
      'request completed'
    );
  });

  server.setErrorHandler(async (error, request, reply) => {
    const httpError = toHttpError(error, options.nodeEnv !== 'production');
    if (httpError.statusCode >= 500) {
      logger.error({ requestId: request.id, error }, 'request failed');
    } else {
      logger.warn(
        { requestId: request.id, code: httpError.code, message: httpError.message },
        'request rejected'
      );
    }

    return reply
      .status(httpError.statusCode)
      .send(errorEnvelope(request.id, httpError.code, httpError.message));
  });

  server.setNotFoundHandler(async (request, reply) => {
    const message = `Route ${request.method} ${withoutQuery(request.url)} not found`;
    return reply.status(404).send(errorEnvelope(request.id, 'NOT_FOUND', message));
  });

  server.get('/health/live', async (_request, reply) => {
    return reply.status(200).send({ status: 'alive' });
  });

  server.get('/health/ready', async (_request, reply) => {
    const databaseOk = await options.checkDatabase();
    const checks = { database: databaseOk ? 'ok' : 'fail' } as const;
    const status = databaseOk ? 'ready' : 'not_ready';
    return reply.status(databaseOk ? 200 : 503).send({ status, checks });
  });

  await server.register(searchRoutes, {
    search: options.search,
    cache: options.searchCache,
    logger,
  });
  await server.register(embeddingsRoutes, {
    embeddings: options.embeddings,
    model: options.model,
    logger,
  });

  return server;
}
