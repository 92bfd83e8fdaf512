import type { JobsOptions } from 'bullmq';

import { withSpan } from '@shopsense/logger';
import {
  validateProductEmbeddingJobPayload,
  type EmbeddingJobQueue,
  type ProductEmbeddingJobPayload,
} from '@shopsense/types';

/** The subset of a BullMQ `Queue` used for enqueueing. */
export type JobAdder<TData> = Readonly<{
  add: (name: string, data: TData, opts?: JobsOptions) => Promise<unknown>;
}>;

export function embeddingJobName(job: ProductEmbeddingJobPayload): string {
  return `embedding.${job.operation}`;
}

/**
 * `EmbeddingJobQueue` over BullMQ. Jobs carry no custom id, so a redelivered or
 * repeated event produces another job; processing is idempotent.
 */
export function createEmbeddingJobQueue(
  queue: JobAdder<ProductEmbeddingJobPayload>
): EmbeddingJobQueue {
  return {
    async enqueue(job, signal) {
      signal?.throwIfAborted();
      const { productId } = job;
      if (!validateProductEmbeddingJobPayload(job)) {
        throw new Error(`Invalid embedding job payload for product ${productId}`);
      }

      await withSpan(
        'queue.enqueue',
        { 'queue.job_name': embeddingJobName(job), 'product.id': job.productId },
        () => queue.add(embeddingJobName(job), job)
      );
    },
  };
}
