/**
 * Provider Override Helpers
 *
 * Read typed generation parameters out of a prompt's provider overrides.
 */

import type { ProviderOverrides } from './types';

export const MAX_TOKENS_KEYS = ['maxTokens', 'max_tokens'] as const;

function firstDefined(overrides: ProviderOverrides, keys: readonly string[]): string | number | undefined {
  for (const key of keys) {
    const value = overrides[key];
    if (value !== undefined && value !== '') {
      return value;
    }
  }
  return undefined;
}

export function readNumber(overrides: ProviderOverrides, ...keys: string[]): number | undefined {
  const value = firstDefined(overrides, keys);
  if (value === undefined) {
    return undefined;
  }

  const parsed = typeof value === 'number' ? value : Number(value.trim());
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function readString(overrides: ProviderOverrides, ...keys: string[]): string | undefined {
  const value = firstDefined(overrides, keys);
  if (value === undefined) {
    return undefined;
  }
  const text = String(value).trim();
  return text.length > 0 ? text : undefined;
}

/**
 * Configured completion budget, or the fallback when absent or not a positive number
 */
export function resolveMaxTokens(overrides: ProviderOverrides, fallback: number): number {
  const value = readNumber(overrides, ...MAX_TOKENS_KEYS);
  if (value === undefined || value <= 0) {
    return fallback;
  }
  return Math.floor(value);
}
