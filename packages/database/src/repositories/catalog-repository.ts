import {
  isAttributeDataType,
  type AttributeDefinitionRecord,
  type CatalogRepository,
  type CategoryRecord,
  type DataScope,
  type ProductListFilter,
  type ProductRecord,
  type SaveCanonicalDocumentInput,
  type ShopRecord,
} from '@shopsense/types';
import { and, asc, count, eq, type SQL } from 'drizzle-orm';
import type { AnyPgColumn } from 'drizzle-orm/pg-core';

import type { Database } from '../db.js';
import { categories, productAttributes, products, shops } from '../schema/index.js';

type ProductRow = typeof products.$inferSelect;

function scopeCondition(column: AnyPgColumn, scope: DataScope): SQL | undefined {
  return scope.kind === 'tenant' ? eq(column, scope.tenantId) : undefined;
}

function parseNumeric(value: string | null): number | null {
  if (value == null) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function toProductRecord(row: ProductRow): ProductRecord {
  return {
    id: row.id,
    tenantId: row.tenantId,
    shopId: row.shopId,
    categoryId: row.categoryId,
    name: row.name,
    description: row.description,
    sku: row.sku,
    price: parseNumeric(row.price) ?? 0,
    compareAtPrice: parseNumeric(row.compareAtPrice),
    stockQuantity: row.stockQuantity,
    isActive: row.isActive,
    isPublished: row.isPublished,
    attributes: row.attributes,
    canonicalDocument: row.canonicalDocument,
    canonicalDocumentVersion: row.canonicalDocumentVersion,
    canonicalDocumentUpdatedAt: row.canonicalDocumentUpdatedAt,
    embeddingGenerated: row.embeddingGenerated,
    updatedAt: row.updatedAt,
  };
}

/**
 * drizzle-orm implementation of the catalog read model.
 * `PLATFORM_SCOPE` reads across tenants; a tenant scope adds a `tenant_id` predicate.
 */
export class DrizzleCatalogRepository implements CatalogRepository {
  public constructor(private readonly db: Database) {}

  public async findProductById(
    productId: string,
    scope: DataScope,
    signal?: AbortSignal
  ): Promise<ProductRecord | null> {
    signal?.throwIfAborted();
    const rows = await this.db
      .select()
      .from(products)
      .where(and(eq(products.id, productId), scopeCondition(products.tenantId, scope)))
      .limit(1);
    const row = rows[0];
    return row ? toProductRecord(row) : null;
  }

  public async listProductIds(
    filter: ProductListFilter,
    scope: DataScope,
    signal?: AbortSignal
  ): Promise<string[]> {
    signal?.throwIfAborted();
    const rows = await this.db
      .select({ id: products.id })
      .from(products)
      .where(
        and(
          scopeCondition(products.tenantId, scope),
          filter.tenantId ? eq(products.tenantId, filter.tenantId) : undefined,
          filter.shopId ? eq(products.shopId, filter.shopId) : undefined,
          filter.activeOnly ? eq(products.isActive, true) : undefined,
          filter.publishedOnly ? eq(products.isPublished, true) : undefined
        )
      )
      .orderBy(asc(products.createdAt), asc(products.id));
    return rows.map((row) => row.id);
  }

  public async findCategoryById(
    categoryId: string,
    scope: DataScope,
    signal?: AbortSignal
  ): Promise<CategoryRecord | null> {
    signal?.throwIfAborted();
    const rows = await this.db
      .select({ id: categories.id, tenantId: categories.tenantId, name: categories.name })
      .from(categories)
      .where(and(eq(categories.id, categoryId), scopeCondition(categories.tenantId, scope)))
      .limit(1);
    return rows[0] ?? null;
  }

  public async findShopById(
    shopId: string,
    scope: DataScope,
    signal?: AbortSignal
  ): Promise<ShopRecord | null> {
    signal?.throwIfAborted();
    const rows = await this.db
      .select({ id: shops.id, tenantId: shops.tenantId, name: shops.name })
      .from(shops)
      .where(and(eq(shops.id, shopId), scopeCondition(shops.tenantId, scope)))
      .limit(1);
    return rows[0] ?? null;
  }

  public async listAttributeDefinitions(
    shopId: string,
    scope: DataScope,
    signal?: AbortSignal
  ): Promise<AttributeDefinitionRecord[]> {
    signal?.throwIfAborted();
    const rows = await this.db
      .select({
        id: productAttributes.id,
        shopId: productAttributes.shopId,
        name: productAttributes.name,
        displayName: productAttributes.displayName,
        dataType: productAttributes.dataType,
        includeInEmbedding: productAttributes.includeInEmbedding,
        embeddingPriority: productAttributes.embeddingPriority,
        semanticLabel: productAttributes.semanticLabel,
      })
      .from(productAttributes)
      .innerJoin(shops, eq(shops.id, productAttributes.shopId))
      .where(and(eq(productAttributes.shopId, shopId), scopeCondition(shops.tenantId, scope)))
      .orderBy(asc(productAttributes.name));

    return rows.map((row) => ({
      ...row,
      dataType: isAttributeDataType(row.dataType) ? row.dataType : 'text',
    }));
  }

  public async saveCanonicalDocument(
    input: SaveCanonicalDocumentInput,
    scope: DataScope,
    signal?: AbortSignal
  ): Promise<void> {
    signal?.throwIfAborted();
    await this.db
      .update(products)
      .set({
        canonicalDocument: input.document,
        canonicalDocumentVersion: input.schemaVersion,
        canonicalDocumentUpdatedAt: input.updatedAt,
      })
      .where(and(eq(products.id, input.productId), scopeCondition(products.tenantId, scope)));
  }

  public async markEmbeddingGenerated(
    productId: string,
    scope: DataScope,
    signal?: AbortSignal
  ): Promise<void> {
    signal?.throwIfAborted();
    await this.db
      .update(products)
      .set({ embeddingGenerated: true })
      .where(and(eq(products.id, productId), scopeCondition(products.tenantId, scope)));
  }

  public async countProductsNeedingEmbedding(scope: DataScope, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    const rows = await this.db
      .select({ value: count() })
      .from(products)
      .where(
        and(
          scopeCondition(products.tenantId, scope),
          eq(products.isActive, true),
          eq(products.isPublished, true),
          eq(products.embeddingGenerated, false)
        )
      );
    return rows[0]?.value ?? 0;
  }
}
