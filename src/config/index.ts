export * from './types';
export { loadConfig, reloadConfig, getConfig, resolveConfig, writeDefaultConfig, DEFAULT_CONFIG } from './loader';
