/**
 * Service Aggregator - Type Definitions
 * Provider-agnostic text generation capability
 */

import type { FinalPrompt, PromptConfig } from '../prompt-assembler/types';

// ============================================================================
// Capability
// ============================================================================

export interface GenerateOptions {
  signal?: AbortSignal;
}

/**
 * What the generation core needs from a text-generation backend.
 *
 * generate() yields text chunks in generation order and throws
 * TokenLimitError on a context-window overflow, GenerationError otherwise.
 * interrupt() aborts whatever call is currently in flight.
 */
export interface ServiceAggregator {
  generate(prompt: FinalPrompt, config: PromptConfig, options?: GenerateOptions): AsyncIterable<string>;
  interrupt(): void;
}

// ============================================================================
// Delta Types (provider streaming)
// ============================================================================

export type Delta = TextDelta | DoneDelta | ErrorDelta;

export interface TextDelta {
  type: 'text';
  text: string;
}

export interface DoneDelta {
  type: 'done';
  usage: TokenUsage;
  stopReason: StopReason;
}

export interface ErrorDelta {
  type: 'error';
  error: AdapterError;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export type StopReason =
  | 'end_turn'       // Model finished naturally
  | 'max_tokens'     // Hit completion budget
  | 'stop_sequence'  // Hit stop sequence
  | 'error';

export interface AdapterError {
  code: string;
  message: string;
  provider: string;
  retryable: boolean;
  statusCode?: number;
  details?: unknown;
}

// ============================================================================
// Provider Adapter Interface
// ============================================================================

export interface GenerationParameters {
  temperature?: number;
  maxTokens?: number;
  topP?: number;
}

export interface ProviderRequest {
  /** Model name without provider prefix; adapters fall back to their default */
  model?: string;
  systemPrompt?: string;
  prompt: string;
  parameters: GenerationParameters;
  signal?: AbortSignal;
}

export interface ProviderConfig {
  apiKey?: string;
  baseUrl?: string;
  defaultModel?: string;
}

export interface ProviderAdapter {
  name: string;
  displayName: string;
  type: 'cloud' | 'local';

  configure(config: ProviderConfig): void;
  isConfigured(): boolean;

  complete(request: ProviderRequest): AsyncIterable<Delta>;

  dispose(): Promise<void>;
}

// ============================================================================
// Aggregator Configuration
// ============================================================================

export type ProviderName = 'openai' | 'anthropic' | 'ollama';

export interface ProviderAggregatorConfig {
  defaultProvider?: string;
  providers?: Partial<Record<ProviderName, ProviderConfig>>;
}
