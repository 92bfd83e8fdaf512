export type NodeEnv = 'development' | 'staging' | 'production' | 'test';

export type EmbeddingStoreDriver = 'pgvector' | 'memory';

export type AppEnv = Readonly<{
  nodeEnv: NodeEnv;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  port: number;

  databaseUrl: string;
  dbPoolSize: number;
  redisUrl: string;

  enableEmbeddingGeneration: boolean;
  ollamaBaseUrl: URL;
  embeddingModel: string;
  embeddingModelVersion: number;
  embeddingDimensions: number;
  embeddingStrictDimensions: boolean;
  embeddingTimeoutMs: number;
  embeddingMaxTokensPerChunk: number;
  embeddingStore: EmbeddingStoreDriver;
  embeddingWorkerConcurrency: number;

  searchDefaultTopK: number;
  searchMaxTopK: number;
  searchHeadroomMultiplier: number;
  searchMaxRawMatches: number;
  searchCacheTtlSeconds: number;
}>;

export type EnvSource = Record<string, string | undefined>;

function requiredString(env: EnvSource, key: string): string {
  const value = env[key];
  if (!value?.trim()) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value.trim();
}

function optionalString(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  if (value == null) return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function parseNodeEnv(value: string | undefined): NodeEnv {
  const normalized = (value ?? 'development').trim();
  if (
    normalized === 'development' ||
    normalized === 'staging' ||
    normalized === 'production' ||
    normalized === 'test'
  ) {
    return normalized;
  }
  throw new Error(`Invalid NODE_ENV: ${normalized}`);
}

function parseLogLevel(value: string | undefined): AppEnv['logLevel'] {
  const normalized = (value ?? 'info').trim();
  if (
    normalized === 'debug' ||
    normalized === 'info' ||
    normalized === 'warn' ||
    normalized === 'error' ||
    normalized === 'fatal'
  ) {
    return normalized;
  }
  throw new Error(`Invalid LOG_LEVEL: ${normalized}`);
}

function parsePort(value: string | undefined): number {
  const raw = (value ?? '65000').trim();
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${raw}`);
  }
  return port;
}

function parseHttpUrl(env: EnvSource, key: string, fallback: string): URL {
  const value = optionalString(env, key) ?? fallback;
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error(`Invalid URL in ${key}: ${value}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Invalid URL protocol for ${key}: ${url.protocol}`);
  }
  return url;
}

function parseUrlWithProtocols(env: EnvSource, key: string, protocols: readonly string[]): string {
  const value = requiredString(env, key);
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error(`Invalid URL in ${key}: ${value}`);
  }
  if (!protocols.includes(url.protocol)) {
    throw new Error(`Invalid URL protocol for ${key}: ${url.protocol}`);
  }
  return value;
}

function parseInteger(
  env: EnvSource,
  key: string,
  fallback: number,
  bounds: Readonly<{ min: number; max?: number }>
): number {
  const raw = optionalString(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < bounds.min || (bounds.max !== undefined && value > bounds.max)) {
    throw new Error(`Invalid ${key}: ${raw}`);
  }
  return value;
}

function parseBoolean(env: EnvSource, key: string, fallback: boolean): boolean {
  const raw = optionalString(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  throw new Error(`Invalid ${key}: ${raw}`);
}

/** Width of product_embeddings.embedding in migrations/0002_product_embeddings.sql. */
export const PGVECTOR_EMBEDDING_DIMENSIONS = 768;

function parseEmbeddingStore(value: string | undefined): EmbeddingStoreDriver {
  const normalized = (value ?? 'pgvector').trim();
  if (normalized === 'pgvector' || normalized === 'memory') return normalized;
  throw new Error(`Invalid EMBEDDING_STORE: ${normalized}`);
}

export function loadEnv(env: EnvSource = process.env): AppEnv {
  const nodeEnv = parseNodeEnv(env['NODE_ENV']);
  const logLevel = parseLogLevel(env['LOG_LEVEL']);
  const port = parsePort(env['PORT'] ?? env['APP_PORT']);

  const databaseUrl = parseUrlWithProtocols(env, 'DATABASE_URL', ['postgres:', 'postgresql:']);
  const dbPoolSize = parseInteger(env, 'DB_POOL_SIZE', 10, { min: 1, max: 200 });
  const redisUrl = parseUrlWithProtocols(env, 'REDIS_URL', ['redis:', 'rediss:']);

  const searchDefaultTopK = parseInteger(env, 'SEARCH_DEFAULT_TOP_K', 10, { min: 1 });
  const searchMaxTopK = parseInteger(env, 'SEARCH_MAX_TOP_K', 50, { min: 1 });
  if (searchDefaultTopK > searchMaxTopK) {
    throw new Error(
      `Invalid SEARCH_DEFAULT_TOP_K: ${searchDefaultTopK} exceeds SEARCH_MAX_TOP_K (${searchMaxTopK})`
    );
  }

  const embeddingStore = parseEmbeddingStore(env['EMBEDDING_STORE']);
  const embeddingDimensions = parseInteger(env, 'EMBEDDING_DIMENSIONS', PGVECTOR_EMBEDDING_DIMENSIONS, {
    min: 1,
    max: 16000,
  });
  if (embeddingStore === 'pgvector' && embeddingDimensions !== PGVECTOR_EMBEDDING_DIMENSIONS) {
    throw new Error(
      `Invalid EMBEDDING_DIMENSIONS: ${embeddingDimensions} does not match the pgvector column (${PGVECTOR_EMBEDDING_DIMENSIONS})`
    );
  }

  return {
    nodeEnv,
    logLevel,
    port,
    databaseUrl,
    dbPoolSize,
    redisUrl,
    enableEmbeddingGeneration: parseBoolean(env, 'ENABLE_EMBEDDING_GENERATION', true),
    ollamaBaseUrl: parseHttpUrl(env, 'OLLAMA_BASE_URL', 'http://localhost:11434'),
    embeddingModel: optionalString(env, 'EMBEDDING_MODEL') ?? 'embeddinggemma',
    embeddingModelVersion: parseInteger(env, 'EMBEDDING_MODEL_VERSION', 1, { min: 1 }),
    embeddingDimensions,
    embeddingStrictDimensions: parseBoolean(env, 'EMBEDDING_STRICT_DIMENSIONS', false),
    embeddingTimeoutMs: parseInteger(env, 'EMBEDDING_TIMEOUT_MS', 60_000, { min: 100 }),
    embeddingMaxTokensPerChunk: parseInteger(env, 'EMBEDDING_MAX_TOKENS_PER_CHUNK', 512, {
      min: 16,
    }),
    embeddingStore,
    embeddingWorkerConcurrency: parseInteger(env, 'EMBEDDING_WORKER_CONCURRENCY', 4, {
      min: 1,
      max: 64,
    }),
    searchDefaultTopK,
    searchMaxTopK,
    searchHeadroomMultiplier: parseInteger(env, 'SEARCH_HEADROOM_MULTIPLIER', 2, { min: 1 }),
    searchMaxRawMatches: parseInteger(env, 'SEARCH_MAX_RAW_MATCHES', 200, { min: 1 }),
    searchCacheTtlSeconds: parseInteger(env, 'SEARCH_CACHE_TTL_SECONDS', 300, { min: 0 }),
  };
}
