import type { Logger } from '@shopsense/logger';
import { PLATFORM_SCOPE, type CatalogRepository, type ProductRecord } from '@shopsense/types';

import {
  buildCanonicalDocument,
  CANONICAL_SCHEMA_VERSION,
  deserializeCanonicalDocument,
  serializeCanonicalDocument,
  type CanonicalProductDocument,
} from '../content/canonical-document.js';

export type CanonicalDocumentServiceDeps = Readonly<{
  catalog: CatalogRepository;
  logger: Logger;
  now?: () => Date;
}>;

/**
 * Resolves the metadata a canonical document needs and keeps a cached copy on the
 * product. Lookups always run with platform scope: embeddings are shared across tenants.
 */
export class CanonicalDocumentService {
  private readonly catalog: CatalogRepository;
  private readonly logger: Logger;
  private readonly now: () => Date;

  public constructor(deps: CanonicalDocumentServiceDeps) {
    this.catalog = deps.catalog;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  public async build(product: ProductRecord, signal?: AbortSignal): Promise<CanonicalProductDocument> {
    const [category, shop, attributeDefinitions] = await Promise.all([
      product.categoryId
        ? this.catalog.findCategoryById(product.categoryId, PLATFORM_SCOPE, signal)
        : Promise.resolve(null),
      this.catalog.findShopById(product.shopId, PLATFORM_SCOPE, signal),
      this.catalog.listAttributeDefinitions(product.shopId, PLATFORM_SCOPE, signal),
    ]);

    const { document, malformedAttributes } = buildCanonicalDocument({
      product,
      categoryName: category?.name ?? null,
      shopName: shop?.name ?? null,
      attributeDefinitions,
      generatedAt: this.now(),
    });

    if (malformedAttributes) {
      this.logger.warn(
        { productId: product.id },
        'Product attributes are not a JSON object; building without attributes'
      );
    }

    return document;
  }

  /**
   * Returns the cached document when it was built with the current schema and is not
   * older than the product; otherwise rebuilds and stores it.
   */
  public async getOrBuild(
    product: ProductRecord,
    signal?: AbortSignal
  ): Promise<CanonicalProductDocument> {
    const cached = this.readCached(product);
    if (cached) return cached;

    const document = await this.build(product, signal);
    await this.catalog.saveCanonicalDocument(
      {
        productId: product.id,
        document: serializeCanonicalDocument(document),
        schemaVersion: document.schemaVersion,
        updatedAt: new Date(document.generatedAt),
      },
      PLATFORM_SCOPE,
      signal
    );
    return document;
  }

  private readCached(product: ProductRecord): CanonicalProductDocument | null {
    if (
      !product.canonicalDocument ||
      product.canonicalDocumentVersion !== CANONICAL_SCHEMA_VERSION ||
      !product.canonicalDocumentUpdatedAt ||
      product.canonicalDocumentUpdatedAt.getTime() < product.updatedAt.getTime()
    ) {
      return null;
    }

    const document = deserializeCanonicalDocument(product.canonicalDocument);
    if (!document || document.schemaVersion !== CANONICAL_SCHEMA_VERSION) {
      this.logger.warn({ productId: product.id }, 'Cached canonical document is unreadable; rebuilding');
      return null;
    }
    return document;
  }
}
