import type { JobsOptions } from 'bullmq';

import type { KnownQueueName } from './names.js';

export const EXP4_BACKOFF_STRATEGY = 'shopsense-exp4' as const;

/**
 * Predictable backoff schedule: 1s → 4s → 16s (factor 4).
 *
 * NOTE: BullMQ calls the strategy for retries only.
 */
export function exp4BackoffMs(attemptsMade: number): number {
  // attemptsMade is 1 for the first retry.
  const retryIndex = Math.max(0, attemptsMade - 1);
  return 1000 * 4 ** retryIndex;
}

export type QueuePolicy = Readonly<{
  attempts: number;
  removeOnComplete: NonNullable<JobsOptions['removeOnComplete']>;
  removeOnFail: NonNullable<JobsOptions['removeOnFail']>;
  backoff: NonNullable<JobsOptions['backoff']>;
}>;

export type QueueTimeoutsMs = Readonly<Record<KnownQueueName, number>>;

/**
 * Job timeouts per queue (in milliseconds). The worker aborts the job's signal when
 * the timeout elapses.
 */
export const DEFAULT_QUEUE_TIMEOUTS_MS: QueueTimeoutsMs = {
  // Validation plus a single enqueue.
  'product-events-queue': 30_000,
  // Several backend calls for long products.
  'embedding-queue': 5 * 60_000,
} as const;

export function defaultJobTimeoutMs(queueName: KnownQueueName): number {
  return DEFAULT_QUEUE_TIMEOUTS_MS[queueName];
}

export function defaultQueuePolicy(): QueuePolicy {
  return {
    attempts: 3,
    // Keep completed jobs for 24h (age in seconds).
    removeOnComplete: { age: 86400 },
    // Keep failed jobs for 7 days (debugging).
    removeOnFail: { age: 604800 },
    backoff: {
      type: EXP4_BACKOFF_STRATEGY,
      delay: 1000,
    },
  };
}

export function backoffStrategy(attemptsMade: number, type?: string): number {
  if (type === EXP4_BACKOFF_STRATEGY) return exp4BackoffMs(attemptsMade);
  return exp4BackoffMs(1);
}
