export { ConfigSchema, ConfigDefaults, type RawConfig, type Config } from './schema.js';
export { loadConfig, loadConfigWithMeta, getConfigPath, setConfigValue, expandTilde, type LoadConfigOptions, type LoadConfigResult, ConfigError } from './loader.js';
