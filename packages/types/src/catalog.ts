/**
 * Catalog read model used to build canonical documents.
 *
 * Every read takes an explicit {@link DataScope}; tenant filtering is never ambient.
 */

export type DataScope = Readonly<{ kind: 'platform' }> | Readonly<{ kind: 'tenant'; tenantId: string }>;

export const PLATFORM_SCOPE: DataScope = { kind: 'platform' };

export const ATTRIBUTE_DATA_TYPES = ['text', 'number', 'boolean', 'date'] as const;

export type AttributeDataType = (typeof ATTRIBUTE_DATA_TYPES)[number];

export function isAttributeDataType(value: unknown): value is AttributeDataType {
  return typeof value === 'string' && (ATTRIBUTE_DATA_TYPES as readonly string[]).includes(value);
}

export type ProductRecord = Readonly<{
  id: string;
  tenantId: string | null;
  shopId: string;
  categoryId: string | null;
  name: string;
  description: string | null;
  sku: string | null;
  price: number;
  compareAtPrice: number | null;
  stockQuantity: number;
  isActive: boolean;
  isPublished: boolean;
  /** Free-form attribute bag, serialized as a JSON object. */
  attributes: string | null;
  canonicalDocument: string | null;
  canonicalDocumentVersion: number | null;
  canonicalDocumentUpdatedAt: Date | null;
  embeddingGenerated: boolean;
  updatedAt: Date;
}>;

export type CategoryRecord = Readonly<{
  id: string;
  tenantId: string | null;
  name: string;
}>;

export type ShopRecord = Readonly<{
  id: string;
  tenantId: string | null;
  name: string;
}>;

export type AttributeDefinitionRecord = Readonly<{
  id: string;
  shopId: string;
  name: string;
  displayName: string;
  dataType: AttributeDataType;
  includeInEmbedding: boolean;
  embeddingPriority: number;
  semanticLabel: string | null;
}>;

export type ProductListFilter = Readonly<{
  tenantId?: string;
  shopId?: string;
  activeOnly?: boolean;
  publishedOnly?: boolean;
}>;

export type SaveCanonicalDocumentInput = Readonly<{
  productId: string;
  document: string;
  schemaVersion: number;
  updatedAt: Date;
}>;

export interface CatalogRepository {
  findProductById(productId: string, scope: DataScope, signal?: AbortSignal): Promise<ProductRecord | null>;
  listProductIds(filter: ProductListFilter, scope: DataScope, signal?: AbortSignal): Promise<string[]>;
  findCategoryById(categoryId: string, scope: DataScope, signal?: AbortSignal): Promise<CategoryRecord | null>;
  findShopById(shopId: string, scope: DataScope, signal?: AbortSignal): Promise<ShopRecord | null>;
  listAttributeDefinitions(
    shopId: string,
    scope: DataScope,
    signal?: AbortSignal
  ): Promise<AttributeDefinitionRecord[]>;
  saveCanonicalDocument(
    input: SaveCanonicalDocumentInput,
    scope: DataScope,
    signal?: AbortSignal
  ): Promise<void>;
  markEmbeddingGenerated(productId: string, scope: DataScope, signal?: AbortSignal): Promise<void>;
  /** Active, published products that have never had an embedding generated. */
  countProductsNeedingEmbedding(scope: DataScope, signal?: AbortSignal): Promise<number>;
}
