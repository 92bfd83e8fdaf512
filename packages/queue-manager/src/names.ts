export const QUEUE_NAMES = ['product-events-queue', 'embedding-queue'] as const;

export type KnownQueueName = (typeof QUEUE_NAMES)[number];

export const PRODUCT_EVENTS_QUEUE_NAME = 'product-events-queue' satisfies KnownQueueName;
export const EMBEDDING_QUEUE_NAME = 'embedding-queue' satisfies KnownQueueName;

export function isKnownQueueName(value: string): value is KnownQueueName {
  return (QUEUE_NAMES as readonly string[]).includes(value);
}

export function toDlqQueueName(queueName: string): string {
  const normalized = queueName.trim();
  if (!normalized) {
    throw new Error('queue_name_empty');
  }

  if (normalized.endsWith('-dlq')) return normalized;
  return `${normalized}-dlq`;
}
