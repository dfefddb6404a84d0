export { readConfig, validateConfig, ConfigError, DEFAULT_CONFIG_PATH } from './reader.js';
export { DispatchConfigSchema, DEFAULT_CONFIG, toIntentModelOptions } from './schema.js';
export type { DispatchConfig, TrainingConfig } from './schema.js';
