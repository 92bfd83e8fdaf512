export { loadEnv, PGVECTOR_EMBEDDING_DIMENSIONS } from './env.js';
export type { AppEnv, EmbeddingStoreDriver, EnvSource, NodeEnv } from './env.js';
