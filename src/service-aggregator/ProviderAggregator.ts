/**
 * Provider Aggregator - Main Facade
 * Routes a final prompt to the configured provider and turns its delta stream
 * into plain text chunks or typed errors.
 */

import type { FinalPrompt, PromptConfig } from '../prompt-assembler/types';
import { readNumber, readString, MAX_TOKENS_KEYS } from '../prompt-assembler/overrides';
import { GenerationError, TokenLimitError } from '../errors';
import { createLogger, type Logger } from '../logger';
import type {
  AdapterError,
  GenerateOptions,
  GenerationParameters,
  ProviderAdapter,
  ProviderAggregatorConfig,
  ProviderConfig,
  ProviderName,
  ServiceAggregator,
} from './types';
import { isContextOverflow } from './error-classifier';
import { OpenAIAdapter } from './providers/openai-adapter';
import { AnthropicAdapter } from './providers/anthropic-adapter';
import { OllamaAdapter } from './providers/ollama-adapter';

// ============================================================================
// Provider Aggregator
// ============================================================================

export class ProviderAggregator implements ServiceAggregator {
  private providers: Map<string, ProviderAdapter> = new Map();
  private defaultProvider: string;
  private inFlight: AbortController | null = null;
  private logger: Logger;

  constructor(config: ProviderAggregatorConfig = {}, logger: Logger = createLogger('aggregator')) {
    this.defaultProvider = config.defaultProvider ?? 'openai';
    this.logger = logger;

    this.initializeProviders(config.providers ?? {});
  }

  private initializeProviders(configs: Partial<Record<ProviderName, ProviderConfig>>): void {
    const builtIn: Array<[ProviderName, ProviderAdapter]> = [
      ['openai', new OpenAIAdapter()],
      ['anthropic', new AnthropicAdapter()],
      ['ollama', new OllamaAdapter()],
    ];

    for (const [name, adapter] of builtIn) {
      adapter.configure(configs[name] ?? {});
      this.providers.set(name, adapter);
    }
  }

  // ============================================================================
  // Generation
  // ============================================================================

  async *generate(
    prompt: FinalPrompt,
    config: PromptConfig,
    options: GenerateOptions = {}
  ): AsyncIterable<string> {
    const providerName = readString(config.providerOverrides, 'provider') ?? this.defaultProvider;
    const provider = this.providers.get(providerName);
    if (!provider) {
      throw new GenerationError(`Provider "${providerName}" not found`, {
        code: 'PROVIDER_NOT_FOUND',
        provider: providerName,
      });
    }

    const controller = new AbortController();
    const onExternalAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    if (this.inFlight && this.inFlight !== controller) {
      this.logger.debug('Replacing in-flight request handle');
    }
    this.inFlight = controller;

    try {
      const deltas = provider.complete({
        model: readString(config.providerOverrides, 'model'),
        systemPrompt: config.systemInstructions,
        prompt,
        parameters: this.toParameters(config),
        signal: controller.signal,
      });

      for await (const delta of deltas) {
        switch (delta.type) {
          case 'text':
            if (delta.text.length > 0) {
              yield delta.text;
            }
            break;

          case 'error':
            throw this.toError(delta.error, prompt, config);

          case 'done':
            this.logger.debug(
              `Generation done (${delta.stopReason}), tokens in=${delta.usage.inputTokens} out=${delta.usage.outputTokens}`
            );
            return;
        }
      }
    } finally {
      options.signal?.removeEventListener('abort', onExternalAbort);
      if (this.inFlight === controller) {
        this.inFlight = null;
      }
    }
  }

  /**
   * Abort the call currently in flight, if any
   */
  interrupt(): void {
    if (this.inFlight && !this.inFlight.signal.aborted) {
      this.logger.debug('Interrupting in-flight request');
      this.inFlight.abort();
    }
  }

  // ============================================================================
  // Conversion
  // ============================================================================

  private toParameters(config: PromptConfig): GenerationParameters {
    const overrides = config.providerOverrides;
    const parameters: GenerationParameters = {};

    const temperature = readNumber(overrides, 'temperature');
    if (temperature !== undefined) parameters.temperature = temperature;

    const maxTokens = readNumber(overrides, ...MAX_TOKENS_KEYS);
    if (maxTokens !== undefined && maxTokens > 0) parameters.maxTokens = Math.floor(maxTokens);

    const topP = readNumber(overrides, 'topP', 'top_p');
    if (topP !== undefined) parameters.topP = topP;

    return parameters;
  }

  private toError(error: AdapterError, prompt: FinalPrompt, config: PromptConfig): Error {
    if (isContextOverflow(error)) {
      return new TokenLimitError(error.message, prompt, config);
    }

    return new GenerationError(error.message, {
      code: error.code,
      provider: error.provider,
      statusCode: error.statusCode,
      context: { retryable: error.retryable },
    });
  }

  // ============================================================================
  // Provider Management
  // ============================================================================

  listProviders(): Array<{ name: string; displayName: string; type: 'cloud' | 'local'; configured: boolean }> {
    return Array.from(this.providers.values()).map(adapter => ({
      name: adapter.name,
      displayName: adapter.displayName,
      type: adapter.type,
      configured: adapter.isConfigured(),
    }));
  }

  /**
   * Add or replace a provider
   */
  addProvider(adapter: ProviderAdapter, config?: ProviderConfig): void {
    if (config) {
      adapter.configure(config);
    }
    this.providers.set(adapter.name, adapter);
  }

  async dispose(): Promise<void> {
    this.interrupt();
    for (const adapter of this.providers.values()) {
      await adapter.dispose();
    }
    this.providers.clear();
  }
}
