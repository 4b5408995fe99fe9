export { ConfigSchema, ConfigDefaults, type RawConfig, type Config, type OutputFormat } from './schema.js';
export {
  loadConfig,
  loadConfigWithMeta,
  getConfigPath,
  setConfigValue,
  toVerificationConfig,
  expandTilde,
  type LoadConfigOptions,
  type LoadConfigResult,
  ConfigError,
} from './loader.js';
