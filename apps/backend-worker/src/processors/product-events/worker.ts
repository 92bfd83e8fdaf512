import type { Logger } from '@shopsense/logger';
import type { DispatchOutcome, ProductChangeDispatcher } from '@shopsense/pim';
import {
  createWorker,
  PRODUCT_EVENTS_QUEUE_NAME,
  UnrecoverableError,
  type CreatedWorker,
  type QueueManagerConfig,
} from '@shopsense/queue-manager';
import { validateProductChangeEvent, type ProductChangeEvent } from '@shopsense/types';

import { productEventsProcessedTotal } from '../../otel/metrics.js';
import type { QueueJobLike } from '../embeddings/worker.js';

export type ProductEventProcessorDeps = Readonly<{
  dispatcher: Pick<ProductChangeDispatcher, 'dispatch'>;
  logger: Logger;
}>;

/** Validates a product change event and hands it to the dispatcher. */
export function createProductEventProcessor(
  deps: ProductEventProcessorDeps
): (job: QueueJobLike, signal: AbortSignal) => Promise<DispatchOutcome> {
  const { dispatcher, logger } = deps;

  return async (job, signal) => {
    const jobId = job.id ?? job.name;
    const event = job.data;
    if (!validateProductChangeEvent(event)) {
      productEventsProcessedTotal.add(1, { change_type: 'unknown', status: 'invalid' });
      logger.error({ jobId, jobName: job.name }, 'Invalid product change event');
      throw new UnrecoverableError(`invalid_product_change_event:${jobId}`);
    }

    const outcome = await dispatcher.dispatch(event, signal);
    productEventsProcessedTotal.add(1, { change_type: event.changeType, status: outcome.status });
    return outcome;
  };
}

export type StartProductEventsWorkerOptions = Readonly<{
  config: QueueManagerConfig;
  dispatcher: Pick<ProductChangeDispatcher, 'dispatch'>;
  logger: Logger;
}>;

export function startProductEventsWorker(
  options: StartProductEventsWorkerOptions
): CreatedWorker<ProductChangeEvent> {
  const logger = options.logger.child({ worker: 'product-events-worker' });

  return createWorker<ProductChangeEvent>(
    { config: options.config },
    {
      name: PRODUCT_EVENTS_QUEUE_NAME,
      logger,
      enableDlq: true,
      processor: createProductEventProcessor({ dispatcher: options.dispatcher, logger }),
    }
  );
}
