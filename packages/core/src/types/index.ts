export * from './audit.js';
export * from './axe.js';
export * from './extraction.js';
export * from './store.js';
export * from './target.js';
export * from './violation.js';
