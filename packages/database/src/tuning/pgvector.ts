import type { DatabaseClient } from '../db.js';

const MIN_EF_SEARCH = 40;
// pgvector rejects hnsw.ef_search above 1000
const MAX_EF_SEARCH = 1000;

export function getOptimalEfSearch(resultLimit: number): number {
  const fallback = MIN_EF_SEARCH;
  if (!Number.isFinite(resultLimit) || resultLimit <= 0) return fallback;
  const computed = Math.round(resultLimit * 2);
  return Math.min(MAX_EF_SEARCH, Math.max(MIN_EF_SEARCH, computed));
}

/** Must run inside a transaction: the setting is scoped with SET LOCAL. */
export async function setHnswEfSearch(client: DatabaseClient, efSearch: number): Promise<void> {
  const value = Math.floor(efSearch);
  const bounded = Math.min(MAX_EF_SEARCH, Math.max(MIN_EF_SEARCH, value));
  await client.query(`SET LOCAL hnsw.ef_search = ${bounded}`);
}

/**
 * Switches the rest of the transaction to exact scans. An HNSW scan stops after
 * ef_search candidates and filters them afterwards, so a short filtered page is
 * re-read without the index.
 */
export async function disableIndexScans(client: DatabaseClient): Promise<void> {
  await client.query('SET LOCAL enable_indexscan = off');
}
