export * from './schema.js';
export { parseRunConfig, loadRunConfig, DEFAULT_CONFIG_PATH } from './loader.js';
