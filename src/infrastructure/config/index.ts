export {
  loadConfig,
  defaultConfig,
  configPaths,
  configFileSchema,
  MAX_SYNC_INTERVAL_MINUTES,
} from './config.js';
export type { RelayConfig, ConfigFile, LoadConfigOptions } from './config.js';
