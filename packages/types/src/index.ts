export * from './catalog.js';
export * from './embeddings.js';
export * from './ids.js';
export * from './products.js';
export * from './search.js';
