/**
 * Configuration
 *
 * @module @pipewright/core/config
 */

export {
  StorageBackend,
  StorageConfig,
  RunnerConfig,
  GitHubConfig,
  NotificationsConfig,
  PipelinesConfig,
  EnvironmentConfig,
  PipewrightConfig,
  defaultConfig,
} from './schema.js';

export {
  type ConfigScope,
  type ConfigLocation,
  type LoadConfigOptions,
  type LoadedConfig,
  getConfigPath,
  expandPath,
  loadConfig,
  validateConfig,
  readConfigFile,
  writeConfigFile,
  getConfigValue,
  setConfigValue,
} from './loader.js';
