/**
 * Structured documents with recursive, merged includes.
 */
export * from './types.js';
export * from './document.js';
export * from './directives.js';
export * from './merge.js';
export * from './loader.js';
