import { EmbeddingInputError, type EmbeddingsProvider } from '@shopsense/ai-engine';
import type { Logger } from '@shopsense/logger';
import type {
  AttributeDefinitionRecord,
  CatalogRepository,
  CategoryRecord,
  DataScope,
  EmbeddingJobQueue,
  EmbeddingVector,
  ProductEmbeddingJobPayload,
  ProductListFilter,
  ProductRecord,
  SaveCanonicalDocumentInput,
  ShopRecord,
} from '@shopsense/types';

export const SHOP_ID = '5a5a5a5a-0000-4000-8000-000000000001';
export const TENANT_ID = '6b6b6b6b-0000-4000-8000-000000000001';
export const CATEGORY_ID = '7c7c7c7c-0000-4000-8000-000000000001';
export const PRODUCT_ID = '8d8d8d8d-0000-4000-8000-000000000001';

export function makeProduct(overrides: Partial<ProductRecord> = {}): ProductRecord {
  return {
    id: PRODUCT_ID,
    tenantId: TENANT_ID,
    shopId: SHOP_ID,
    categoryId: CATEGORY_ID,
    name: 'Desk Lamp',
    description: 'Warm light',
    sku: 'DL-1',
    price: 49.5,
    compareAtPrice: null,
    stockQuantity: 3,
    isActive: true,
    isPublished: true,
    attributes: null,
    canonicalDocument: null,
    canonicalDocumentVersion: null,
    canonicalDocumentUpdatedAt: null,
    embeddingGenerated: false,
    updatedAt: new Date('2026-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

export type LoggedEntry = Readonly<{ level: string; context: Record<string, unknown>; message: string }>;

export function createRecordingLogger(entries: LoggedEntry[] = []): Logger {
  const record =
    (level: string) =>
    (context: Record<string, unknown>, message: string): void => {
      entries.push({ level, context, message });
    };
  const logger: Logger = {
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    fatal: record('fatal'),
    child: () => logger,
  };
  return logger;
}

function visible(tenantId: string | null, scope: DataScope): boolean {
  return scope.kind === 'platform' || tenantId === scope.tenantId;
}

export class FakeCatalogRepository implements CatalogRepository {
  public readonly products = new Map<string, ProductRecord>();
  public readonly categories = new Map<string, CategoryRecord>();
  public readonly shops = new Map<string, ShopRecord>();
  public readonly definitions: AttributeDefinitionRecord[] = [];
  public readonly saved: SaveCanonicalDocumentInput[] = [];
  public readonly marked: string[] = [];
  public readonly scopes: DataScope[] = [];
  public listFailure: Error | null = null;

  public constructor(products: readonly ProductRecord[] = []) {
    for (const product of products) this.products.set(product.id, product);
    this.categories.set(CATEGORY_ID, { id: CATEGORY_ID, tenantId: TENANT_ID, name: 'Lighting' });
    this.shops.set(SHOP_ID, { id: SHOP_ID, tenantId: TENANT_ID, name: 'Bright Shop' });
  }

  public findProductById(productId: string, scope: DataScope): Promise<ProductRecord | null> {
    this.scopes.push(scope);
    const product = this.products.get(productId);
    return Promise.resolve(product && visible(product.tenantId, scope) ? product : null);
  }

  public listProductIds(filter: ProductListFilter, scope: DataScope): Promise<string[]> {
    this.scopes.push(scope);
    if (this.listFailure) return Promise.reject(this.listFailure);
    const ids = [...this.products.values()]
      .filter((p) => visible(p.tenantId, scope))
      .filter((p) => filter.tenantId === undefined || p.tenantId === filter.tenantId)
      .filter((p) => filter.shopId === undefined || p.shopId === filter.shopId)
      .filter((p) => !filter.activeOnly || p.isActive)
      .filter((p) => !filter.publishedOnly || p.isPublished)
      .map((p) => p.id);
    return Promise.resolve(ids);
  }

  public findCategoryById(categoryId: string, scope: DataScope): Promise<CategoryRecord | null> {
    this.scopes.push(scope);
    return Promise.resolve(this.categories.get(categoryId) ?? null);
  }

  public findShopById(shopId: string, scope: DataScope): Promise<ShopRecord | null> {
    this.scopes.push(scope);
    return Promise.resolve(this.shops.get(shopId) ?? null);
  }

  public listAttributeDefinitions(shopId: string, scope: DataScope): Promise<AttributeDefinitionRecord[]> {
    this.scopes.push(scope);
    return Promise.resolve(this.definitions.filter((d) => d.shopId === shopId));
  }

  public saveCanonicalDocument(input: SaveCanonicalDocumentInput, scope: DataScope): Promise<void> {
    this.scopes.push(scope);
    this.saved.push(input);
    return Promise.resolve();
  }

  public markEmbeddingGenerated(productId: string, scope: DataScope): Promise<void> {
    this.scopes.push(scope);
    this.marked.push(productId);
    return Promise.resolve();
  }

  public countProductsNeedingEmbedding(scope: DataScope): Promise<number> {
    this.scopes.push(scope);
    const count = [...this.products.values()].filter(
      (p) => p.isActive && p.isPublished && !p.embeddingGenerated
    ).length;
    return Promise.resolve(count);
  }
}

/**
 * Deterministic provider: a text maps to the vector registered for it, or to `[1, 0]`.
 */
export class FakeEmbeddingsProvider implements EmbeddingsProvider {
  public readonly kind = 'ollama';
  public readonly model: EmbeddingsProvider['model'];
  public readonly calls: string[] = [];
  public readonly vectors = new Map<string, EmbeddingVector>();
  public connected = true;
  public failure: Error | null = null;

  public constructor(model: Partial<EmbeddingsProvider['model']> = {}) {
    this.model = { name: 'embeddinggemma', version: 1, dimensions: 2, ...model };
  }

  public generateEmbedding(text: string, signal?: AbortSignal): Promise<EmbeddingVector> {
    signal?.throwIfAborted();
    if (!text.trim()) return Promise.reject(new EmbeddingInputError('EMBEDDING_FAILED: empty text'));
    this.calls.push(text);
    if (this.failure) return Promise.reject(this.failure);
    return Promise.resolve(this.vectors.get(text) ?? [1, 0]);
  }

  public async generateEmbeddings(
    texts: readonly string[],
    signal?: AbortSignal
  ): Promise<EmbeddingVector[]> {
    const vectors: EmbeddingVector[] = [];
    for (const text of texts) vectors.push(await this.generateEmbedding(text, signal));
    return vectors;
  }

  public testConnection(): Promise<boolean> {
    return Promise.resolve(this.connected);
  }
}

export class RecordingJobQueue implements EmbeddingJobQueue {
  public readonly jobs: ProductEmbeddingJobPayload[] = [];
  public readonly failFor = new Set<string>();

  public enqueue(job: ProductEmbeddingJobPayload): Promise<void> {
    if (this.failFor.has(job.productId)) {
      return Promise.reject(new Error('queue unavailable'));
    }
    this.jobs.push(job);
    return Promise.resolve();
  }
}
