export * from './attributes.js';
export * from './canonical-document.js';
export * from './chunker.js';
export { collapseWhitespace, stripHtml } from './text.js';
