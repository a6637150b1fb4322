export { loadConfig, resolveConnectionOptions, ConfigError } from './loader.js'
export { DEFAULT_CONFIG, DEFAULT_CONNECTION_OPTIONS } from './defaults.js'
