export * from './types.js';
export * from './traverse.js';
export * from './printer.js';
export * from './schema.js';
export * from './loader.js';
