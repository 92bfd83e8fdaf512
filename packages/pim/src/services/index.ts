export * from './canonical-document-service.js';
export * from './change-dispatcher.js';
export * from './embedding-pipeline.js';
export * from './embedding-reindex.js';
export * from './semantic-search.js';
