/**
 * Product content and embedding orchestration: canonical documents, chunking,
 * the per-product embedding pipeline, change dispatch, semantic search and reindexing.
 */

export * from './content/index.js';
export * from './services/index.js';
