/**
 * accessorize: encapsulates fields behind synthesized getters and setters
 * by rewriting compilation units handed over by a front end.
 * Main library exports barrel file.
 */

// Syntax tree and compilation units
export * from './core/ast/index.js';

// Source edits
export * from './core/edits/index.js';

// Transforms
export * from './core/transforms/index.js';
export * from './core/accessors/index.js';

// Configuration and driver
export * from './core/config/index.js';
export * from './core/driver/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
