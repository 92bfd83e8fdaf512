/**
 * Forward-only SQL migration runner.
 *
 * Files in ../migrations are applied in lexical order, each in its own transaction,
 * while a session advisory lock keeps concurrent runners out.
 */

import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Logger } from '@shopsense/logger';

import type { DatabaseClient } from './db.js';

export const MIGRATION_LOCK_ID = 74_210_001;

export const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL('../migrations/', import.meta.url));

export interface MigrationClient extends DatabaseClient {
  release(): void;
}

export interface MigrationPool {
  connect(): Promise<MigrationClient>;
}

export type Migration = Readonly<{ name: string; sql: string }>;

export async function loadMigrations(dir: string = DEFAULT_MIGRATIONS_DIR): Promise<Migration[]> {
  const files = (await readdir(dir)).filter((file) => file.endsWith('.sql')).sort();
  const migrations: Migration[] = [];
  for (const name of files) {
    migrations.push({ name, sql: await readFile(path.join(dir, name), 'utf8') });
  }
  return migrations;
}

export async function runMigrations(params: {
  pool: MigrationPool;
  logger: Logger;
  migrations: readonly Migration[];
}): Promise<string[]> {
  const { pool, logger, migrations } = params;
  const client = await pool.connect();
  const applied: string[] = [];

  try {
    await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_ID]);
    try {
      await client.query(
        `CREATE TABLE IF NOT EXISTS schema_migrations (
           name text PRIMARY KEY,
           applied_at timestamptz NOT NULL DEFAULT now()
         )`
      );
      const existing = await client.query<{ name: string }>('SELECT name FROM schema_migrations');
      const done = new Set(existing.rows.map((row) => row.name));

      for (const migration of migrations) {
        if (done.has(migration.name)) continue;

        await client.query('BEGIN');
        try {
          await client.query(migration.sql);
          await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [migration.name]);
          await client.query('COMMIT');
        } catch (error) {
          await client.query('ROLLBACK');
          throw error;
        }
        applied.push(migration.name);
        logger.info({ migration: migration.name }, 'Migration applied');
      }
    } finally {
      await client.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_ID]);
    }
  } finally {
    client.release();
  }

  return applied;
}
