/**
 * PostgreSQL access for the catalog read model and product embeddings.
 */

export {
  checkDatabaseConnection,
  closePool,
  createDatabase,
  createDbPool,
  withTransaction,
} from './db.js';
export type { Database, DatabaseClient, DatabasePool, PooledDatabaseClient } from './db.js';

export { DEFAULT_MIGRATIONS_DIR, loadMigrations, runMigrations } from './migrate.js';
export type { Migration, MigrationClient, MigrationPool } from './migrate.js';

export { DrizzleCatalogRepository } from './repositories/catalog-repository.js';
export { InMemoryEmbeddingStore } from './repositories/memory-embedding-store.js';
export { PgEmbeddingStore } from './repositories/pg-embedding-store.js';

export { disableIndexScans, getOptimalEfSearch, setHnswEfSearch } from './tuning/pgvector.js';

export { cosineDistance, parsePgVector, toPgVectorLiteral, toSimilarityScore } from './vector.js';

export * from './schema/index.js';

export type { Pool, PoolClient } from 'pg';
