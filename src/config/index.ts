export {
  loadConfig,
  validateConfig,
  configFromEnv,
  deepMergeConfigs,
  type ConfigLoadOptions,
  type ConfigLoadResult,
} from './config-manager.js';
export * from './schema.js';
