export * from './header.js';
export * from './discovery.js';
