export { ConfigSchema, ConfigDefaults, type RawConfig, type Config } from './schema.js';
export {
  loadConfig,
  loadConfigWithMeta,
  getConfigPath,
  setConfigValue,
  formatConfig,
  expandTilde,
  type LoadConfigOptions,
  type LoadConfigResult,
} from './loader.js';
