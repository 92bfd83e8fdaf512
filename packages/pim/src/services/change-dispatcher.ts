import { withSpan, type Logger } from '@shopsense/logger';
import type {
  EmbeddingJobQueue,
  EmbeddingOperation,
  ProductChangeEvent,
} from '@shopsense/types';

export type DispatchOutcome =
  | Readonly<{ status: 'disabled' }>
  | Readonly<{ status: 'enqueued'; operation: EmbeddingOperation }>;

export function resolveEmbeddingOperation(
  event: Pick<ProductChangeEvent, 'changeType' | 'isEligibleForEmbedding'>
): EmbeddingOperation {
  switch (event.changeType) {
    case 'created':
    case 'updated':
      return event.isEligibleForEmbedding ? 'generate' : 'deactivate';
    case 'deleted':
      return 'delete';
    case 'published':
      return 'activate';
    case 'unpublished':
      return 'deactivate';
    case 'bulk_reindex':
      return 'generate';
  }
}

export type ProductChangeDispatcherDeps = Readonly<{
  queue: EmbeddingJobQueue;
  logger: Logger;
  enabled: boolean;
  now?: () => number;
}>;

/** Maps each product change to one embedding job. Performs no I/O besides the enqueue. */
export class ProductChangeDispatcher {
  private readonly queue: EmbeddingJobQueue;
  private readonly logger: Logger;
  private readonly enabled: boolean;
  private readonly now: () => number;

  public constructor(deps: ProductChangeDispatcherDeps) {
    this.queue = deps.queue;
    this.logger = deps.logger;
    this.enabled = deps.enabled;
    this.now = deps.now ?? Date.now;
  }

  public async dispatch(event: ProductChangeEvent, signal?: AbortSignal): Promise<DispatchOutcome> {
    if (!this.enabled) {
      this.logger.debug(
        { productId: event.productId, changeType: event.changeType },
        'Embedding generation disabled, ignoring product change'
      );
      return { status: 'disabled' };
    }

    const operation = resolveEmbeddingOperation(event);

    await withSpan(
      'embeddings.enqueue',
      { 'product.id': event.productId, 'embedding.operation': operation },
      () =>
        this.queue.enqueue(
          {
            productId: event.productId,
            operation,
            triggeredBy: 'event',
            requestedAt: this.now(),
            changeType: event.changeType,
          },
          signal
        )
    );

    this.logger.info(
      { productId: event.productId, changeType: event.changeType, operation },
      'Enqueued embedding job for product change'
    );
    return { status: 'enqueued', operation };
  }
}
