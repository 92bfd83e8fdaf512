import { sha256Hex } from '@shopsense/ai-engine';
import type { Logger } from '@shopsense/logger';
import type { ProductSearchResult } from '@shopsense/types';
import { z } from 'zod';

/** The subset of an ioredis client the cache talks to. */
export interface SearchCacheClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, expiryMode: 'EX', seconds: number): Promise<unknown>;
  incr(key: string): Promise<number>;
}

export type SearchCacheKeyInput = Readonly<{
  query: string;
  topK: number;
  tenantId: string | null;
  shopId: string | null;
}>;

const DEFAULT_MAX_RESULT_SIZE = 50 * 1024;

/** Bumped whenever indexed products change; every key embeds the current value. */
export const SEARCH_CACHE_GENERATION_KEY = 'cache:search:generation';

const CachedResultSchema = z.object({
  productId: z.string(),
  shopId: z.string(),
  relevanceScore: z.number(),
  productName: z.string(),
  shopName: z.string().nullable(),
  categoryName: z.string().nullable(),
  price: z.number(),
  isInStock: z.boolean(),
  isOnSale: z.boolean(),
  sku: z.string().nullable(),
  matchedSnippet: z.string(),
});

const CachedEntrySchema = z.object({
  results: z.array(CachedResultSchema),
  cachedAt: z.string(),
});

/**
 * Trims and collapses whitespace. Case is kept: the same string is embedded and keyed,
 * so queries differing only in case never share an entry.
 */
export function normalizeSearchQuery(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

export function getSearchCacheKey(input: SearchCacheKeyInput, generation: number): string {
  const fingerprint = JSON.stringify([
    normalizeSearchQuery(input.query),
    input.topK,
    input.tenantId,
    input.shopId,
  ]);
  return `cache:search:g${generation}:${sha256Hex(fingerprint)}`;
}

export type SearchCacheOptions = Readonly<{
  client: SearchCacheClient;
  ttlSeconds: number;
  logger: Logger;
  maxResultSize?: number;
}>;

/**
 * Cache of search results. Entries expire after the TTL, and `invalidate` retires all of
 * them at once by bumping the generation counter that every key embeds. Redis failures
 * degrade to a cache miss; they are logged and never fail the search itself.
 */
export class SearchCache {
  private readonly client: SearchCacheClient;
  private readonly ttlSeconds: number;
  private readonly logger: Logger;
  private readonly maxResultSize: number;

  public constructor(options: SearchCacheOptions) {
    this.client = options.client;
    this.ttlSeconds = options.ttlSeconds;
    this.logger = options.logger;
    this.maxResultSize = options.maxResultSize ?? DEFAULT_MAX_RESULT_SIZE;
  }

  public get enabled(): boolean {
    return this.ttlSeconds > 0;
  }

  public async get(input: SearchCacheKeyInput): Promise<ProductSearchResult[] | null> {
    if (!this.enabled || !normalizeSearchQuery(input.query)) return null;

    let raw: string | null;
    try {
      const generation = await this.currentGeneration();
      raw = await this.client.get(getSearchCacheKey(input, generation));
    } catch (error) {
      this.logger.warn({ error }, 'Search cache read failed');
      return null;
    }
    if (!raw) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ error }, 'Search cache entry is not valid JSON');
      return null;
    }

    const entry = CachedEntrySchema.safeParse(parsed);
    return entry.success ? entry.data.results : null;
  }

  public async set(input: SearchCacheKeyInput, results: readonly ProductSearchResult[]): Promise<void> {
    if (!this.enabled || !normalizeSearchQuery(input.query)) return;

    const raw = JSON.stringify({ results, cachedAt: new Date().toISOString() });
    if (raw.length > this.maxResultSize) return;

    try {
      const generation = await this.currentGeneration();
      await this.client.set(getSearchCacheKey(input, generation), raw, 'EX', this.ttlSeconds);
    } catch (error) {
      this.logger.warn({ error }, 'Search cache write failed');
    }
  }

  /** Retires every cached result; older entries age out under their TTL. */
  public async invalidate(): Promise<void> {
    if (!this.enabled) return;

    try {
      const generation = await this.client.incr(SEARCH_CACHE_GENERATION_KEY);
      this.logger.debug({ generation }, 'Search cache invalidated');
    } catch (error) {
      this.logger.warn({ error }, 'Search cache invalidation failed');
    }
  }

  private async currentGeneration(): Promise<number> {
    const raw = await this.client.get(SEARCH_CACHE_GENERATION_KEY);
    const generation = raw === null ? 0 : Number.parseInt(raw, 10);
    return Number.isFinite(generation) ? generation : 0;
  }
}
