/**
 * Configuration Schema
 */

import { z } from 'zod';

export const PROVIDER_NAMES = ['openai', 'anthropic', 'ollama'] as const;

export const TOKENIZER_ENCODINGS = ['gpt2', 'r50k_base', 'p50k_base', 'p50k_edit', 'cl100k_base', 'o200k_base'] as const;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

const positiveInt = z.coerce.number().int().positive();

export const appConfigSchema = z.object({
  provider: z
    .object({
      name: z.enum(PROVIDER_NAMES).default('openai'),
      model: z.string().min(1).optional(),
      baseUrl: z.string().url().optional(),
      apiKey: z.string().min(1).optional(),
    })
    .default({}),
  worker: z
    .object({
      stopGraceMs: positiveInt.default(5000),
    })
    .default({}),
  recovery: z
    .object({
      summaryTimeoutMs: positiveInt.default(30000),
      truncationRatio: z.coerce.number().gt(0).lte(1).default(0.5),
      defaultMaxTokens: positiveInt.default(2000),
    })
    .default({}),
  tokenizer: z
    .object({
      encoding: z.enum(TOKENIZER_ENCODINGS).default('cl100k_base'),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
    })
    .default({}),
});

export type AppConfig = z.output<typeof appConfigSchema>;

/**
 * Programmatic overrides: any subset of any section
 */
export type ConfigOverrides = {
  [K in keyof AppConfig]?: Partial<AppConfig[K]>;
};
