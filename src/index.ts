/**
 * confweave - resolve source/include graphs of configuration files.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Path expansion, `source` directives, flat graphs
export * from './core/source/index.js';

// Structured documents and merged includes
export * from './core/include/index.js';

// Metadata headers and discovery
export * from './core/metadata/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
