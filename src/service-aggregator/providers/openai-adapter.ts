/**
 * OpenAI Adapter
 * Chat Completions with SSE streaming. Also serves OpenAI-compatible servers
 * (LM Studio, OpenRouter, vLLM) through baseUrl.
 */

import type {
  Delta,
  ProviderAdapter,
  ProviderConfig,
  ProviderRequest,
  StopReason,
} from '../types';
import { readErrorResponse, toTransportError } from '../error-classifier';
import { getNumber, getRecord, getString, isRecord, readSSEData, tryParseJson } from '../stream-lines';

// ============================================================================
// OpenAI API Types
// ============================================================================

interface OpenAIMessage {
  role: 'system' | 'user';
  content: string;
}

interface OpenAIRequestBody {
  model: string;
  messages: OpenAIMessage[];
  stream: true;
  stream_options: { include_usage: boolean };
  max_tokens?: number;
  temperature?: number;
  top_p?: number;
}

// ============================================================================
// OpenAI Provider Adapter
// ============================================================================

export class OpenAIAdapter implements ProviderAdapter {
  name = 'openai';
  displayName = 'OpenAI (GPT)';
  type: 'cloud' | 'local' = 'cloud';

  private apiKey: string | null = null;
  private baseUrl = 'https://api.openai.com/v1';
  private defaultModel = 'gpt-4o-mini';

  // ============================================================================
  // Configuration
  // ============================================================================

  configure(config: ProviderConfig): void {
    this.apiKey = config.apiKey || null;
    this.baseUrl = (config.baseUrl || this.baseUrl).replace(/\/+$/, '');
    this.defaultModel = config.defaultModel || this.defaultModel;
  }

  isConfigured(): boolean {
    return this.apiKey !== null || !this.baseUrl.startsWith('https://api.openai.com');
  }

  // ============================================================================
  // Main Completion Method
  // ============================================================================

  async *complete(request: ProviderRequest): AsyncIterable<Delta> {
    if (!this.isConfigured()) {
      yield {
        type: 'error',
        error: {
          code: 'MISSING_API_KEY',
          message: 'OpenAI API key not configured',
          provider: this.name,
          retryable: false,
        },
      };
      return;
    }

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: this.getHeaders(),
        body: JSON.stringify(this.buildRequestBody(request)),
        signal: request.signal,
      });

      if (!response.ok) {
        yield { type: 'error', error: await readErrorResponse(response, this.name) };
        return;
      }

      if (!response.body) {
        yield {
          type: 'error',
          error: { code: 'EMPTY_BODY', message: 'Response has no body', provider: this.name, retryable: true },
        };
        return;
      }

      yield* this.parseStream(response.body);
    } catch (error) {
      yield { type: 'error', error: toTransportError(error, this.name, request.signal) };
    }
  }

  // ============================================================================
  // Request Building
  // ============================================================================

  private buildRequestBody(request: ProviderRequest): OpenAIRequestBody {
    const messages: OpenAIMessage[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    messages.push({ role: 'user', content: request.prompt });

    const body: OpenAIRequestBody = {
      model: request.model || this.defaultModel,
      messages,
      stream: true,
      stream_options: { include_usage: true },
    };

    const { maxTokens, temperature, topP } = request.parameters;
    if (maxTokens !== undefined) body.max_tokens = maxTokens;
    if (temperature !== undefined) body.temperature = temperature;
    if (topP !== undefined) body.top_p = topP;

    return body;
  }

  // ============================================================================
  // SSE Stream Parsing
  // ============================================================================

  private async *parseStream(stream: ReadableStream<Uint8Array>): AsyncIterable<Delta> {
    let stopReason: StopReason = 'end_turn';
    let inputTokens = 0;
    let outputTokens = 0;

    for await (const data of readSSEData(stream)) {
      if (data === '[DONE]') break;

      const chunk = tryParseJson(data);
      if (!isRecord(chunk)) continue;

      const streamError = getRecord(chunk, 'error');
      if (streamError) {
        yield {
          type: 'error',
          error: {
            code: getString(streamError, 'code') ?? getString(streamError, 'type') ?? 'STREAM_ERROR',
            message: getString(streamError, 'message') ?? 'Stream error',
            provider: this.name,
            retryable: false,
            details: streamError,
          },
        };
        return;
      }

      const usage = getRecord(chunk, 'usage');
      if (usage) {
        inputTokens = getNumber(usage, 'prompt_tokens') ?? inputTokens;
        outputTokens = getNumber(usage, 'completion_tokens') ?? outputTokens;
      }

      const choices = chunk['choices'];
      const choice = Array.isArray(choices) ? choices[0] : undefined;
      if (!isRecord(choice)) continue;

      const delta = getRecord(choice, 'delta');
      const content = delta ? getString(delta, 'content') : undefined;
      if (content) {
        yield { type: 'text', text: content };
      }

      const finishReason = getString(choice, 'finish_reason');
      if (finishReason) {
        stopReason = this.convertFinishReason(finishReason);
      }
    }

    yield { type: 'done', usage: { inputTokens, outputTokens }, stopReason };
  }

  private convertFinishReason(reason: string): StopReason {
    switch (reason) {
      case 'length':
        return 'max_tokens';
      case 'content_filter':
        return 'stop_sequence';
      default:
        return 'end_turn';
    }
  }

  // ============================================================================
  // Cleanup
  // ============================================================================

  async dispose(): Promise<void> {
    this.apiKey = null;
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }
    return headers;
  }
}
