/**
 * Catalog tables read by the embedding pipeline.
 *
 * The product_embeddings table (pgvector column + HNSW index) is defined in
 * migrations/0002_product_embeddings.sql and accessed through raw SQL.
 */

import {
  pgTable,
  uuid,
  text,
  varchar,
  integer,
  boolean,
  numeric,
  timestamp,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

export const shops = pgTable(
  'shops',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id'),
    name: varchar('name', { length: 255 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_shops_tenant').on(table.tenantId)]
);

export const categories = pgTable(
  'categories',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id'),
    name: varchar('name', { length: 255 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_categories_tenant').on(table.tenantId)]
);

export const productAttributes = pgTable(
  'product_attributes',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    shopId: uuid('shop_id')
      .notNull()
      .references(() => shops.id, { onDelete: 'cascade' }),
    name: varchar('name', { length: 100 }).notNull(),
    displayName: varchar('display_name', { length: 255 }).notNull(),
    // text | number | boolean | date
    dataType: varchar('data_type', { length: 20 }).notNull().default('text'),
    includeInEmbedding: boolean('include_in_embedding').notNull().default(true),
    embeddingPriority: integer('embedding_priority').notNull().default(0),
    semanticLabel: varchar('semantic_label', { length: 255 }),
  },
  (table) => [uniqueIndex('idx_product_attributes_shop_name').on(table.shopId, table.name)]
);

export const products = pgTable(
  'products',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id'),
    shopId: uuid('shop_id')
      .notNull()
      .references(() => shops.id, { onDelete: 'cascade' }),
    categoryId: uuid('category_id').references(() => categories.id, { onDelete: 'set null' }),
    name: varchar('name', { length: 500 }).notNull(),
    description: text('description'),
    sku: varchar('sku', { length: 100 }),
    price: numeric('price', { precision: 18, scale: 2 }).notNull(),
    compareAtPrice: numeric('compare_at_price', { precision: 18, scale: 2 }),
    stockQuantity: integer('stock_quantity').notNull().default(0),
    isActive: boolean('is_active').notNull().default(true),
    isPublished: boolean('is_published').notNull().default(false),
    // JSON object serialized as text; may be malformed
    attributes: text('attributes'),
    canonicalDocument: text('canonical_document'),
    canonicalDocumentVersion: integer('canonical_document_version'),
    canonicalDocumentUpdatedAt: timestamp('canonical_document_updated_at', { withTimezone: true }),
    embeddingGenerated: boolean('embedding_generated').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_products_shop').on(table.shopId),
    index('idx_products_tenant').on(table.tenantId),
    index('idx_products_active_published').on(table.isActive, table.isPublished),
  ]
);
