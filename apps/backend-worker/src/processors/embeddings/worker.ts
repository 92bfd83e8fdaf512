import type { Logger } from '@shopsense/logger';
import type { EmbeddingPipeline, PipelineOutcome } from '@shopsense/pim';
import {
  createWorker,
  EMBEDDING_QUEUE_NAME,
  UnrecoverableError,
  type CreatedWorker,
  type QueueManagerConfig,
} from '@shopsense/queue-manager';
import {
  validateProductEmbeddingJobPayload,
  type ProductEmbeddingJobPayload,
} from '@shopsense/types';

import {
  embeddingChunksEmbeddedTotal,
  embeddingChunksReusedTotal,
  embeddingJobsFailedTotal,
  embeddingJobsProcessedTotal,
} from '../../otel/metrics.js';
import type { SearchCache } from '../search/cache.js';
import { classifyEmbeddingError } from './error-classifier.js';

export type QueueJobLike = Readonly<{
  id?: string | undefined;
  name: string;
  data: unknown;
  attemptsMade: number;
}>;

export type EmbeddingJobProcessorDeps = Readonly<{
  pipeline: Pick<EmbeddingPipeline, 'run'>;
  logger: Logger;
  searchCache?: Pick<SearchCache, 'invalidate'> | null;
}>;

/** Whether cached search results may now be stale. */
export function changesSearchResults(outcome: PipelineOutcome): boolean {
  switch (outcome.status) {
    case 'disabled':
    case 'not_found':
      return false;
    case 'generated':
      return true;
    case 'activated':
    case 'deactivated':
    case 'deleted':
      return outcome.chunks > 0;
  }
}

function recordOutcome(operation: string, outcome: PipelineOutcome): void {
  embeddingJobsProcessedTotal.add(1, { operation, status: outcome.status });
  if (outcome.status === 'generated') {
    embeddingChunksEmbeddedTotal.add(outcome.chunks - outcome.reused);
    embeddingChunksReusedTotal.add(outcome.reused);
  }
}

/**
 * Runs one embedding job through the pipeline. Malformed payloads and permanent
 * failures are raised as `UnrecoverableError` so BullMQ skips the remaining attempts
 * and the job lands in the DLQ.
 */
export function createEmbeddingJobProcessor(
  deps: EmbeddingJobProcessorDeps
): (job: QueueJobLike, signal: AbortSignal) => Promise<PipelineOutcome> {
  const { pipeline, logger } = deps;
  const searchCache = deps.searchCache ?? null;

  return async (job, signal) => {
    const jobId = job.id ?? job.name;
    const payload = job.data;
    if (!validateProductEmbeddingJobPayload(payload)) {
      embeddingJobsFailedTotal.add(1, { operation: 'unknown', classification: 'permanent' });
      logger.error({ jobId, jobName: job.name }, 'Invalid embedding job payload');
      throw new UnrecoverableError(`invalid_embedding_job_payload:${jobId}`);
    }

    const log = logger.child({
      jobId,
      productId: payload.productId,
      operation: payload.operation,
    });

    try {
      const outcome = await pipeline.run(payload, signal);
      recordOutcome(payload.operation, outcome);
      if (searchCache && changesSearchResults(outcome)) {
        await searchCache.invalidate();
      }
      log.info(
        { status: outcome.status, attemptsMade: job.attemptsMade, triggeredBy: payload.triggeredBy },
        'Embedding job completed'
      );
      return outcome;
    } catch (error) {
      const decision = classifyEmbeddingError(error);
      embeddingJobsFailedTotal.add(1, {
        operation: payload.operation,
        classification: decision.classification,
      });
      log.warn(
        { error, errorType: decision.errorType, shouldRetry: decision.shouldRetry },
        'Embedding job failed'
      );

      if (!decision.shouldRetry) {
        const message = error instanceof Error ? error.message : String(error);
        throw new UnrecoverableError(message);
      }
      throw error;
    }
  };
}

export type StartEmbeddingWorkerOptions = Readonly<{
  config: QueueManagerConfig;
  pipeline: Pick<EmbeddingPipeline, 'run'>;
  searchCache: SearchCache | null;
  logger: Logger;
  concurrency: number;
}>;

export function startEmbeddingWorker(
  options: StartEmbeddingWorkerOptions
): CreatedWorker<ProductEmbeddingJobPayload> {
  const logger = options.logger.child({ worker: 'embedding-worker' });

  return createWorker<ProductEmbeddingJobPayload>(
    { config: options.config },
    {
      name: EMBEDDING_QUEUE_NAME,
      logger,
      enableDlq: true,
      workerOptions: { concurrency: options.concurrency },
      processor: createEmbeddingJobProcessor({
        pipeline: options.pipeline,
        searchCache: options.searchCache,
        logger,
      }),
    }
  );
}
