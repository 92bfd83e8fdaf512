export {
  closeWorkers,
  configFromEnv,
  createQueue,
  createWorker,
  isTerminalFailure,
  withJobTimeout,
} from './queue-manager.js';
export type {
  CreatedWorker,
  CreateQueueManagerOptions,
  CreateQueueOptions,
  CreateWorkerOptions,
  DlqEntry,
  JobProcessor,
  QueueManagerConfig,
} from './queue-manager.js';

export {
  EMBEDDING_QUEUE_NAME,
  isKnownQueueName,
  PRODUCT_EVENTS_QUEUE_NAME,
  QUEUE_NAMES,
  toDlqQueueName,
} from './names.js';
export type { KnownQueueName } from './names.js';

export {
  backoffStrategy,
  DEFAULT_QUEUE_TIMEOUTS_MS,
  defaultJobTimeoutMs,
  defaultQueuePolicy,
  EXP4_BACKOFF_STRATEGY,
  exp4BackoffMs,
} from './policy.js';
export type { QueuePolicy, QueueTimeoutsMs } from './policy.js';

export { createRedisConnection, redisConnectionOptions } from './redis.js';
export type { CreateRedisConnectionOptions, RedisConnection } from './redis.js';

export { createEmbeddingJobQueue, embeddingJobName } from './embeddings.js';
export type { JobAdder } from './embeddings.js';
export { PRODUCT_CHANGE_JOB_NAME, publishProductChangeEvent } from './product-events.js';

export { UnrecoverableError } from 'bullmq';
export type { Job, Queue, Worker } from 'bullmq';
