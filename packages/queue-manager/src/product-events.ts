import { validateProductChangeEvent, type ProductChangeEvent } from '@shopsense/types';

import type { JobAdder } from './embeddings.js';

export const PRODUCT_CHANGE_JOB_NAME = 'product.changed';

/** Publishes a product lifecycle event for the embedding pipeline. */
export async function publishProductChangeEvent(
  queue: JobAdder<ProductChangeEvent>,
  event: ProductChangeEvent
): Promise<void> {
  const { productId } = event;
  if (!validateProductChangeEvent(event)) {
    throw new Error(`Invalid product change event for product ${productId}`);
  }
  await queue.add(PRODUCT_CHANGE_JOB_NAME, event);
}
