/**
 * Anthropic Adapter
 * Messages API with SSE streaming
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

interface AnthropicRequestBody {
  model: string;
  max_tokens: number;
  messages: Array<{ role: 'user'; content: string }>;
  stream: true;
  system?: string;
  temperature?: number;
  top_p?: number;
}

const API_VERSION = '2023-06-01';
const DEFAULT_MAX_TOKENS = 4096;

export class AnthropicAdapter implements ProviderAdapter {
  name = 'anthropic';
  displayName = 'Anthropic (Claude)';
  type: 'cloud' | 'local' = 'cloud';

  private apiKey: string | null = null;
  private baseUrl = 'https://api.anthropic.com';
  private defaultModel = 'claude-3-5-haiku-latest';

  configure(config: ProviderConfig): void {
    this.apiKey = config.apiKey || null;
    this.baseUrl = (config.baseUrl || this.baseUrl).replace(/\/+$/, '');
    this.defaultModel = config.defaultModel || this.defaultModel;
  }

  isConfigured(): boolean {
    return this.apiKey !== null;
  }

  async *complete(request: ProviderRequest): AsyncIterable<Delta> {
    if (!this.apiKey) {
      yield {
        type: 'error',
        error: {
          code: 'MISSING_API_KEY',
          message: 'Anthropic API key not configured',
          provider: this.name,
          retryable: false,
        },
      };
      return;
    }

    try {
      const response = await fetch(`${this.baseUrl}/v1/messages`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'anthropic-version': API_VERSION,
          'x-api-key': this.apiKey,
        },
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

  private buildRequestBody(request: ProviderRequest): AnthropicRequestBody {
    const body: AnthropicRequestBody = {
      model: request.model || this.defaultModel,
      max_tokens: request.parameters.maxTokens ?? DEFAULT_MAX_TOKENS,
      messages: [{ role: 'user', content: request.prompt }],
      stream: true,
    };

    if (request.systemPrompt) body.system = request.systemPrompt;
    if (request.parameters.temperature !== undefined) body.temperature = request.parameters.temperature;
    if (request.parameters.topP !== undefined) body.top_p = request.parameters.topP;

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
      const event = tryParseJson(data);
      if (!isRecord(event)) continue;

      switch (getString(event, 'type')) {
        case 'message_start': {
          const usage = getRecord(getRecord(event, 'message') ?? {}, 'usage');
          if (usage) inputTokens = getNumber(usage, 'input_tokens') ?? inputTokens;
          break;
        }

        case 'content_block_delta': {
          const delta = getRecord(event, 'delta');
          const text = delta && getString(delta, 'type') === 'text_delta' ? getString(delta, 'text') : undefined;
          if (text) {
            yield { type: 'text', text };
          }
          break;
        }

        case 'message_delta': {
          const delta = getRecord(event, 'delta');
          const reason = delta ? getString(delta, 'stop_reason') : undefined;
          if (reason) stopReason = this.convertStopReason(reason);
          const usage = getRecord(event, 'usage');
          if (usage) outputTokens = getNumber(usage, 'output_tokens') ?? outputTokens;
          break;
        }

        case 'error': {
          const error = getRecord(event, 'error') ?? {};
          yield {
            type: 'error',
            error: {
              code: getString(error, 'type') ?? 'STREAM_ERROR',
              message: getString(error, 'message') ?? 'Stream error',
              provider: this.name,
              retryable: getString(error, 'type') === 'overloaded_error',
              details: error,
            },
          };
          return;
        }

        case 'message_stop':
          yield { type: 'done', usage: { inputTokens, outputTokens }, stopReason };
          return;
      }
    }

    yield { type: 'done', usage: { inputTokens, outputTokens }, stopReason };
  }

  private convertStopReason(reason: string): StopReason {
    switch (reason) {
      case 'max_tokens':
        return 'max_tokens';
      case 'stop_sequence':
        return 'stop_sequence';
      default:
        return 'end_turn';
    }
  }

  async dispose(): Promise<void> {
    this.apiKey = null;
  }
}
