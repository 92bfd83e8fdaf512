import { isCanonicalUuid } from './ids.js';

export const PRODUCT_CHANGE_TYPES = [
  'created',
  'updated',
  'deleted',
  'published',
  'unpublished',
  'bulk_reindex',
] as const;

export type ProductChangeType = (typeof PRODUCT_CHANGE_TYPES)[number];

export interface ProductChangeEvent {
  productId: string;
  shopId: string;
  tenantId: string | null;
  changeType: ProductChangeType;
  /** Active and published at the time the event was raised. */
  isEligibleForEmbedding: boolean;
  canonicalDocumentVersion: number;
  changedAt: string;
  productName?: string;
  /** Only meaningful for `updated`. */
  modifiedFields?: string[];
}

export function isProductChangeType(value: unknown): value is ProductChangeType {
  return typeof value === 'string' && (PRODUCT_CHANGE_TYPES as readonly string[]).includes(value);
}

export function validateProductChangeEvent(data: unknown): data is ProductChangeEvent {
  if (!data || typeof data !== 'object') return false;
  const event = data as Partial<ProductChangeEvent>;

  if (typeof event.productId !== 'string' || !isCanonicalUuid(event.productId)) return false;
  if (typeof event.shopId !== 'string' || !isCanonicalUuid(event.shopId)) return false;
  if (event.tenantId !== null) {
    if (typeof event.tenantId !== 'string' || !isCanonicalUuid(event.tenantId)) return false;
  }
  if (!isProductChangeType(event.changeType)) return false;
  if (typeof event.isEligibleForEmbedding !== 'boolean') return false;
  if (
    typeof event.canonicalDocumentVersion !== 'number' ||
    !Number.isInteger(event.canonicalDocumentVersion) ||
    event.canonicalDocumentVersion < 0
  ) {
    return false;
  }
  if (typeof event.changedAt !== 'string' || Number.isNaN(Date.parse(event.changedAt))) return false;

  if (event.productName !== undefined && typeof event.productName !== 'string') return false;
  if (event.modifiedFields !== undefined) {
    if (!Array.isArray(event.modifiedFields)) return false;
    if (!event.modifiedFields.every((field) => typeof field === 'string')) return false;
  }

  return true;
}
