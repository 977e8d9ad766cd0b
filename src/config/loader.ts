/**
 * Configuration Loader
 *
 * Merges, lowest priority first: defaults, environment, JSON file,
 * programmatic overrides. The providers' conventional variables
 * (OPENAI_API_KEY, ANTHROPIC_API_KEY, OLLAMA_BASE_URL) only fill what is
 * still missing after the merge.
 */

import * as fs from 'fs/promises';
import { ConfigError } from '../errors';
import { createLogger } from '../logger';
import type { ProviderAggregatorConfig } from '../service-aggregator/types';
import { appConfigSchema, type AppConfig, type ConfigOverrides } from './schema';

export const DEFAULT_ENV_PREFIX = 'PROSE_DISPATCH';

export interface LoadConfigOptions {
  envPrefix?: string;
  configFile?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
}

type ConfigLayer = Record<string, unknown>;

const logger = createLogger('config');

/** Environment suffix -> [section, key] */
const ENV_KEYS: Array<[string, string, string]> = [
  ['PROVIDER', 'provider', 'name'],
  ['MODEL', 'provider', 'model'],
  ['BASE_URL', 'provider', 'baseUrl'],
  ['API_KEY', 'provider', 'apiKey'],
  ['STOP_GRACE_MS', 'worker', 'stopGraceMs'],
  ['SUMMARY_TIMEOUT_MS', 'recovery', 'summaryTimeoutMs'],
  ['TRUNCATION_RATIO', 'recovery', 'truncationRatio'],
  ['DEFAULT_MAX_TOKENS', 'recovery', 'defaultMaxTokens'],
  ['TOKENIZER_ENCODING', 'tokenizer', 'encoding'],
  ['LOG_LEVEL', 'logging', 'level'],
];

// ============================================================================
// Loading
// ============================================================================

export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const { envPrefix = DEFAULT_ENV_PREFIX, configFile, overrides = {}, env = process.env } = options;

  let merged: ConfigLayer = fromEnv(env, envPrefix);

  if (configFile) {
    merged = mergeLayers(merged, await fromFile(configFile));
  }

  merged = mergeLayers(merged, overrides);

  const result = appConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const config = withConventionalCredentials(result.data, env);
  logger.debug(
    `Loaded configuration (provider=${config.provider.name}, apiKey=${maskSecret(config.provider.apiKey)})`
  );
  return config;
}

function fromEnv(env: NodeJS.ProcessEnv, prefix: string): ConfigLayer {
  const layer: ConfigLayer = {};
  for (const [suffix, section, key] of ENV_KEYS) {
    const value = env[`${prefix}_${suffix}`];
    if (value !== undefined && value !== '') {
      const current = layer[section];
      layer[section] = { ...(isRecord(current) ? current : {}), [key]: value };
    }
  }
  return layer;
}

async function fromFile(configPath: string): Promise<ConfigLayer> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      logger.debug(`No configuration file at ${configPath}`);
      return {};
    }
    throw new ConfigError(`Failed to read configuration from ${configPath}`, { cause: String(error) });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripLineComments(content));
  } catch (error) {
    throw new ConfigError(`Configuration file ${configPath} is not valid JSON`, { cause: String(error) });
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Configuration file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

function withConventionalCredentials(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  const provider = { ...config.provider };

  if (!provider.apiKey) {
    const conventional =
      provider.name === 'openai' ? env.OPENAI_API_KEY : provider.name === 'anthropic' ? env.ANTHROPIC_API_KEY : undefined;
    if (conventional) provider.apiKey = conventional;
  }

  if (!provider.baseUrl && provider.name === 'ollama' && env.OLLAMA_BASE_URL) {
    provider.baseUrl = env.OLLAMA_BASE_URL;
  }

  return { ...config, provider };
}

// ============================================================================
// Mapping
// ============================================================================

/**
 * Provider section as the aggregator expects it
 */
export function toAggregatorConfig(config: AppConfig): ProviderAggregatorConfig {
  const { name, model, baseUrl, apiKey } = config.provider;
  return {
    defaultProvider: name,
    providers: {
      [name]: { apiKey, baseUrl, defaultModel: model },
    },
  };
}

export function maskSecret(value: string | undefined): string {
  if (!value) return '(none)';
  if (value.length <= 8) return '***';
  return `${value.slice(0, 4)}...${value.slice(-4)}`;
}

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Drop whole-line // comments (JSONC)
 */
function stripLineComments(content: string): string {
  return content
    .split('\n')
    .filter(line => !line.trim().startsWith('//'))
    .join('\n');
}

/**
 * Section-wise merge; undefined values never mask a lower layer
 */
function mergeLayers(base: ConfigLayer, layer: ConfigLayer): ConfigLayer {
  const merged: ConfigLayer = { ...base };
  for (const [section, values] of Object.entries(layer)) {
    if (values === undefined) continue;

    const current = merged[section];
    merged[section] = isRecord(current) && isRecord(values) ? { ...current, ...definedEntries(values) } : values;
  }
  return merged;
}

function definedEntries(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}
