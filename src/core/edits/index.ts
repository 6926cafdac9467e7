export * from './edit-buffer.js';
export * from './source-text.js';
