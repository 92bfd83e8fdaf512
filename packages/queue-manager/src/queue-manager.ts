import { metrics } from '@opentelemetry/api';
import {
  Queue,
  Worker,
  type ConnectionOptions,
  type Job,
  type JobsOptions,
  type QueueOptions,
  type WorkerOptions,
} from 'bullmq';

import type { AppEnv } from '@shopsense/config';
import type { Logger } from '@shopsense/logger';

import { isKnownQueueName, toDlqQueueName } from './names.js';
import { backoffStrategy, defaultJobTimeoutMs, defaultQueuePolicy } from './policy.js';
import { redisConnectionOptions } from './redis.js';

export type QueueManagerConfig = Readonly<{
  redisUrl: string;
}>;

export function configFromEnv(env: AppEnv): QueueManagerConfig {
  return { redisUrl: env.redisUrl };
}

export type CreateQueueManagerOptions = Readonly<{
  config: QueueManagerConfig;
  /** Overrides merged over the options derived from `config.redisUrl`. */
  connection?: ConnectionOptions;
}>;

const meter = metrics.getMeter('shopsense.queue-manager');
const dlqEntriesTotal = meter.createCounter('queue_dlq_entries_total', {
  description: 'Total jobs moved to DLQ',
});

const DLQ_RETENTION_SECONDS = 30 * 86400;

function buildConnection(options: CreateQueueManagerOptions): ConnectionOptions {
  return {
    ...redisConnectionOptions(options.config.redisUrl),
    ...(options.connection ?? {}),
  };
}

export type DlqEntry = Readonly<{
  originalQueue: string;
  originalJobId: string | null;
  originalJobName: string;
  attemptsMade: number;
  failedReason: string | null;
  stacktrace: readonly string[];
  data: unknown;
  occurredAt: string;
}>;

export type CreateQueueOptions = Readonly<{
  name: string;
  queueOptions?: Omit<QueueOptions, 'connection' | 'defaultJobOptions'>;
  defaultJobOptions?: Partial<JobsOptions>;
}>;

export function createQueue<TData>(
  options: CreateQueueManagerOptions,
  queue: CreateQueueOptions
): Queue<TData> {
  const policy = defaultQueuePolicy();
  const overrideJobOptions = queue.defaultJobOptions ?? {};

  return new Queue<TData>(queue.name, {
    connection: buildConnection(options),
    defaultJobOptions: {
      ...overrideJobOptions,
      attempts: overrideJobOptions.attempts ?? policy.attempts,
      removeOnComplete: overrideJobOptions.removeOnComplete ?? policy.removeOnComplete,
      removeOnFail: overrideJobOptions.removeOnFail ?? policy.removeOnFail,
      backoff: overrideJobOptions.backoff ?? policy.backoff,
    },
    ...(queue.queueOptions ?? {}),
  });
}

/** Receives the job and a signal that aborts when the job times out. */
export type JobProcessor<TData> = (job: Job<TData>, signal: AbortSignal) => Promise<unknown>;

/**
 * Runs `processor` with an abort signal bound to `timeoutMs`. The returned promise
 * rejects with the timeout error even when the processor ignores the signal.
 */
export function withJobTimeout<TJob>(
  processor: (job: TJob, signal: AbortSignal) => Promise<unknown>,
  timeoutMs: number | null
): (job: TJob) => Promise<unknown> {
  return async (job) => {
    if (!timeoutMs || timeoutMs <= 0) {
      return processor(job, new AbortController().signal);
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new Error(`Job exceeded timeout of ${timeoutMs}ms`);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });

    try {
      return await Promise.race([processor(job, controller.signal), timeoutPromise]);
    } finally {
      clearTimeout(timer);
    }
  };
}

type FailedJobShape = Readonly<{
  attemptsMade: number;
  opts: Readonly<{ attempts?: number }>;
}>;

/**
 * Terminal failures go to the DLQ: retries exhausted, or the processor threw
 * BullMQ's `UnrecoverableError`.
 */
export function isTerminalFailure(job: FailedJobShape, err: Error, defaultAttempts: number): boolean {
  if (err.name === 'UnrecoverableError') return true;
  const maxAttempts = job.opts.attempts ?? defaultAttempts;
  // attemptsMade is the 1-based attempt count.
  return job.attemptsMade >= maxAttempts;
}

export type CreateWorkerOptions<TData> = Readonly<{
  name: string;
  processor: JobProcessor<TData>;
  logger: Logger;
  workerOptions?: Omit<WorkerOptions, 'connection' | 'settings'>;
  /** Job execution timeout. Known queues default to their standard timeout; null disables it. */
  jobTimeoutMs?: number | null;
  /** If true, terminal failures are copied into `${name}-dlq`. */
  enableDlq?: boolean;
  onDlqEntry?: (entry: DlqEntry) => void;
}>;

export type CreatedWorker<TData> = Readonly<{
  worker: Worker<TData>;
  dlqQueue?: Queue<DlqEntry>;
}>;

export function createWorker<TData>(
  options: CreateQueueManagerOptions,
  worker: CreateWorkerOptions<TData>
): CreatedWorker<TData> {
  const policy = defaultQueuePolicy();
  const logger = worker.logger.child({ queueName: worker.name });

  const resolvedTimeoutMs =
    worker.jobTimeoutMs !== undefined
      ? worker.jobTimeoutMs
      : isKnownQueueName(worker.name)
        ? defaultJobTimeoutMs(worker.name)
        : null;

  const dlqQueue = worker.enableDlq
    ? createQueue<DlqEntry>(options, { name: toDlqQueueName(worker.name) })
    : undefined;

  const w = new Worker<TData>(worker.name, withJobTimeout(worker.processor, resolvedTimeoutMs), {
    connection: buildConnection(options),
    settings: { backoffStrategy },
    ...(worker.workerOptions ?? {}),
  });

  w.on('error', (err) => {
    logger.error({ err }, 'Worker error');
  });

  if (dlqQueue) {
    const handleFailed = async (job: Job<TData>, err: Error): Promise<void> => {
      if (!isTerminalFailure(job, err, policy.attempts)) return;

      const entry: DlqEntry = {
        originalQueue: worker.name,
        originalJobId: job.id != null ? String(job.id) : null,
        originalJobName: job.name,
        attemptsMade: job.attemptsMade,
        failedReason: err.message,
        stacktrace: job.stacktrace ?? [],
        data: job.data,
        occurredAt: new Date().toISOString(),
      };

      // BullMQ validates that custom jobIds cannot contain ':'
      const derivedJobId = entry.originalJobId ? `${worker.name}__${entry.originalJobId}` : null;
      await dlqQueue.add(job.name, entry, {
        ...(derivedJobId ? { jobId: derivedJobId } : {}),
        removeOnComplete: { age: DLQ_RETENTION_SECONDS },
        removeOnFail: { age: DLQ_RETENTION_SECONDS },
      });

      dlqEntriesTotal.add(1, { queue_name: worker.name });

      // Keep this log compact; `entry.data` may be big.
      logger.error(
        {
          dlqQueueName: dlqQueue.name,
          jobName: entry.originalJobName,
          originalJobId: entry.originalJobId,
          attemptsMade: entry.attemptsMade,
          failedReason: entry.failedReason,
        },
        'Job moved to DLQ'
      );

      worker.onDlqEntry?.(entry);
    };

    w.on('failed', (job, err) => {
      if (!job) return;
      handleFailed(job, err).catch((dlqError: unknown) => {
        // The original failed job stays in place for investigation.
        logger.error(
          { jobId: job.id != null ? String(job.id) : null, err: dlqError },
          'Failed to write DLQ entry'
        );
      });
    });
  }

  return dlqQueue ? { worker: w, dlqQueue } : { worker: w };
}

type Closable = Readonly<{ close: () => Promise<void> }>;

export async function closeWorkers(
  workers: readonly Readonly<{ worker: Closable; dlqQueue?: Closable }>[]
): Promise<void> {
  await Promise.all(
    workers.map(async ({ worker, dlqQueue }) => {
      await worker.close();
      await dlqQueue?.close();
    })
  );
}
