/**
 * Canonical product document
 *
 * A point-in-time, normalized view of a product used as the single source for
 * embedding text and for the display payload stored beside each vector.
 * Building is pure: callers resolve category/shop/attribute metadata first.
 */

import { z } from 'zod';

import type {
  AttributeDefinitionRecord,
  ProductEmbeddingPayload,
  ProductRecord,
} from '@shopsense/types';

import {
  formatAttributeValue,
  normalizeAttributes,
  orderAttributes,
  parseAttributeBag,
  type CanonicalAttribute,
} from './attributes.js';
import { collapseWhitespace, stripHtml } from './text.js';

/** Bump whenever the document shape or its text rendering changes. */
export const CANONICAL_SCHEMA_VERSION = 1;

export type CanonicalProductDocument = Readonly<{
  schemaVersion: number;
  productId: string;
  shopId: string;
  tenantId: string | null;
  name: string;
  description: string | null;
  sku: string | null;
  price: number;
  isInStock: boolean;
  isOnSale: boolean;
  categoryName: string | null;
  shopName: string | null;
  generatedAt: string;
  attributes: ReadonlyMap<string, CanonicalAttribute>;
}>;

export type CanonicalDocumentSources = Readonly<{
  product: ProductRecord;
  categoryName: string | null;
  shopName: string | null;
  attributeDefinitions: readonly AttributeDefinitionRecord[];
  generatedAt: Date;
}>;

export type CanonicalDocumentBuild = Readonly<{
  document: CanonicalProductDocument;
  /** The product carried an attribute blob that was not a JSON object. */
  malformedAttributes: boolean;
}>;

function optionalText(value: string | null | undefined): string | null {
  const trimmed = value ? collapseWhitespace(value) : '';
  return trimmed ? trimmed : null;
}

export function buildCanonicalDocument(sources: CanonicalDocumentSources): CanonicalDocumentBuild {
  const { product } = sources;
  const bag = parseAttributeBag(product.attributes);

  const description = product.description ? optionalText(stripHtml(product.description)) : null;

  return {
    malformedAttributes: bag.malformed,
    document: {
      schemaVersion: CANONICAL_SCHEMA_VERSION,
      productId: product.id,
      shopId: product.shopId,
      tenantId: product.tenantId,
      name: collapseWhitespace(product.name),
      description,
      sku: optionalText(product.sku),
      price: product.price,
      isInStock: product.stockQuantity > 0,
      isOnSale: product.compareAtPrice !== null && product.compareAtPrice > product.price,
      categoryName: optionalText(sources.categoryName),
      shopName: optionalText(sources.shopName),
      generatedAt: sources.generatedAt.toISOString(),
      attributes: normalizeAttributes(bag.entries, sources.attributeDefinitions),
    },
  };
}

/**
 * Deterministic text used for chunking and embedding.
 * Lines are separated by `\n`; specifications are ordered by priority.
 */
export function renderEmbeddingText(document: CanonicalProductDocument): string {
  const lines: string[] = [`Product: ${document.name}`];

  if (document.shopName) lines.push(`Shop: ${document.shopName}`);
  if (document.categoryName) lines.push(`Category: ${document.categoryName}`);
  if (document.description) lines.push(`Description: ${document.description}`);

  lines.push(`Price: ${document.price.toFixed(2)}`);

  if (document.isOnSale) lines.push('This product is currently on sale.');
  if (!document.isInStock) lines.push('This product is currently out of stock.');

  if (document.attributes.size > 0) {
    lines.push('Specifications:');
    for (const [, attribute] of orderAttributes(document.attributes)) {
      lines.push(`- ${attribute.semanticLabel}: ${formatAttributeValue(attribute.value)}`);
    }
  }

  return lines.join('\n').trim();
}

export function buildEmbeddingPayload(document: CanonicalProductDocument): ProductEmbeddingPayload {
  return {
    productId: document.productId,
    name: document.name,
    shopId: document.shopId,
    shopName: document.shopName,
    categoryName: document.categoryName,
    price: document.price,
    isInStock: document.isInStock,
    isOnSale: document.isOnSale,
    sku: document.sku,
  };
}

// ============================================
// Persistence (cached copy on the product row)
// ============================================

const AttributeValueSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('text'), value: z.string() }),
  z.object({ kind: z.literal('number'), value: z.number() }),
  z.object({ kind: z.literal('boolean'), value: z.boolean() }),
  z.object({ kind: z.literal('date'), value: z.string() }),
]);

const StoredAttributeSchema = z.object({
  value: AttributeValueSchema,
  dataType: z.enum(['text', 'number', 'boolean', 'date']),
  semanticLabel: z.string(),
  priority: z.number(),
});

const StoredDocumentSchema = z.object({
  schemaVersion: z.number().int(),
  productId: z.string(),
  shopId: z.string(),
  tenantId: z.string().nullable(),
  name: z.string(),
  description: z.string().nullable(),
  sku: z.string().nullable(),
  price: z.number(),
  isInStock: z.boolean(),
  isOnSale: z.boolean(),
  categoryName: z.string().nullable(),
  shopName: z.string().nullable(),
  generatedAt: z.string(),
  attributes: z.array(z.tuple([z.string(), StoredAttributeSchema])),
});

export function serializeCanonicalDocument(document: CanonicalProductDocument): string {
  return JSON.stringify({ ...document, attributes: [...document.attributes.entries()] });
}

/** Returns null for anything that is not a well-formed stored document. */
export function deserializeCanonicalDocument(raw: string): CanonicalProductDocument | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  const result = StoredDocumentSchema.safeParse(parsed);
  if (!result.success) return null;

  return { ...result.data, attributes: new Map(result.data.attributes) };
}
