/**
 * hydrate-notation: attribute-style access to nested JSON, YAML, TOML and
 * in-memory data.
 * Main library exports barrel file.
 */

// Core
export * from './core/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
