export * from './types.js';
export * from './registry.js';
export { registerBuiltinTransforms } from './register.js';
export { applyTransforms } from './runner.js';
