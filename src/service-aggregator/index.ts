/**
 * Service Aggregator - Public API
 */

export { ProviderAggregator } from './ProviderAggregator';
export { isContextOverflow, readErrorResponse, isRetryableStatus } from './error-classifier';
export { readLines, readSSEData } from './stream-lines';

export { OpenAIAdapter } from './providers/openai-adapter';
export { AnthropicAdapter } from './providers/anthropic-adapter';
export { OllamaAdapter } from './providers/ollama-adapter';

export type {
  ServiceAggregator,
  GenerateOptions,
  Delta,
  TextDelta,
  DoneDelta,
  ErrorDelta,
  TokenUsage,
  StopReason,
  AdapterError,
  GenerationParameters,
  ProviderAdapter,
  ProviderRequest,
  ProviderConfig,
  ProviderName,
  ProviderAggregatorConfig,
} from './types';
