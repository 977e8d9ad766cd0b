export { loadConfig, toAggregatorConfig, maskSecret, DEFAULT_ENV_PREFIX } from './loader';
export type { LoadConfigOptions } from './loader';
export { appConfigSchema, PROVIDER_NAMES, TOKENIZER_ENCODINGS, LOG_LEVELS } from './schema';
export type { AppConfig, ConfigOverrides } from './schema';
