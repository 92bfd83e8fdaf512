/**
 * PostgreSQL connection: one pg Pool shared by drizzle-orm and raw SQL repositories.
 */

import type { Logger } from '@shopsense/logger';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';

import * as schema from './schema/index.js';

const { Pool } = pg;

/** Structural subset of `pg.Pool` / `pg.PoolClient` used by raw SQL repositories. */
export interface DatabaseClient {
  query<T extends Record<string, unknown>>(
    sql: string,
    values?: unknown[]
  ): Promise<{ rows: T[]; rowCount: number | null }>;
}

/** A checked-out connection, released back to its pool. */
export interface PooledDatabaseClient extends DatabaseClient {
  release(error?: Error | boolean): void;
}

/** Structural subset of `pg.Pool` for repositories that need a single connection. */
export interface DatabasePool extends DatabaseClient {
  connect(): Promise<PooledDatabaseClient>;
}

export type Database = NodePgDatabase<typeof schema>;

export function createDbPool(params: { connectionString: string; poolSize?: number }): pg.Pool {
  return new Pool({
    connectionString: params.connectionString,
    max: params.poolSize ?? 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });
}

export function createDatabase(pool: pg.Pool): Database {
  return drizzle(pool, { schema });
}

/**
 * Runs `fn` on one connection inside BEGIN/COMMIT, rolling back when it throws.
 */
export async function withTransaction<T>(
  pool: DatabasePool,
  fn: (client: DatabaseClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

type HealthCheckRow = Readonly<{ health: number }>;

export async function checkDatabaseConnection(
  client: DatabaseClient,
  logger: Logger
): Promise<boolean> {
  try {
    const result = await client.query<HealthCheckRow>('SELECT 1 as health');
    return result.rows[0]?.health === 1;
  } catch (error) {
    logger.warn(
      { error: error instanceof Error ? error.message : String(error) },
      'Database health check failed'
    );
    return false;
  }
}

export async function closePool(pool: pg.Pool): Promise<void> {
  await pool.end();
}
