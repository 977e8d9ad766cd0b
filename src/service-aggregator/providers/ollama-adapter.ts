/**
 * Ollama Adapter
 * Local models over the chat endpoint with NDJSON streaming
 */

import type {
  Delta,
  ProviderAdapter,
  ProviderConfig,
  ProviderRequest,
  StopReason,
} from '../types';
import { readErrorResponse, toTransportError } from '../error-classifier';
import { getNumber, getRecord, getString, isRecord, readLines, tryParseJson } from '../stream-lines';

interface OllamaRequestBody {
  model: string;
  messages: Array<{ role: 'system' | 'user'; content: string }>;
  stream: true;
  options?: {
    temperature?: number;
    top_p?: number;
    num_predict?: number;
  };
}

export class OllamaAdapter implements ProviderAdapter {
  name = 'ollama';
  displayName = 'Ollama (Local)';
  type: 'cloud' | 'local' = 'local';

  private baseUrl = 'http://localhost:11434';
  private defaultModel = 'llama3.1';

  configure(config: ProviderConfig): void {
    this.baseUrl = (config.baseUrl || this.baseUrl).replace(/\/+$/, '');
    this.defaultModel = config.defaultModel || this.defaultModel;
  }

  isConfigured(): boolean {
    return true;
  }

  async *complete(request: ProviderRequest): AsyncIterable<Delta> {
    try {
      const response = await fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
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

  private buildRequestBody(request: ProviderRequest): OllamaRequestBody {
    const messages: OllamaRequestBody['messages'] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    messages.push({ role: 'user', content: request.prompt });

    const body: OllamaRequestBody = {
      model: request.model || this.defaultModel,
      messages,
      stream: true,
    };

    const options: NonNullable<OllamaRequestBody['options']> = {};
    const { maxTokens, temperature, topP } = request.parameters;
    if (temperature !== undefined) options.temperature = temperature;
    if (topP !== undefined) options.top_p = topP;
    if (maxTokens !== undefined) options.num_predict = maxTokens;

    if (Object.keys(options).length > 0) {
      body.options = options;
    }

    return body;
  }

  // ============================================================================
  // NDJSON Stream Parsing
  // ============================================================================

  private async *parseStream(stream: ReadableStream<Uint8Array>): AsyncIterable<Delta> {
    for await (const line of readLines(stream)) {
      if (!line.trim()) continue;

      const chunk = tryParseJson(line);
      if (!isRecord(chunk)) continue;

      const error = getString(chunk, 'error');
      if (error) {
        yield {
          type: 'error',
          error: { code: 'OLLAMA_ERROR', message: error, provider: this.name, retryable: false },
        };
        return;
      }

      const message = getRecord(chunk, 'message');
      const content = message ? getString(message, 'content') : undefined;
      if (content) {
        yield { type: 'text', text: content };
      }

      if (chunk['done'] === true) {
        const reason = getString(chunk, 'done_reason');
        const stopReason: StopReason = reason === 'length' ? 'max_tokens' : 'end_turn';
        yield {
          type: 'done',
          usage: {
            inputTokens: getNumber(chunk, 'prompt_eval_count') ?? 0,
            outputTokens: getNumber(chunk, 'eval_count') ?? 0,
          },
          stopReason,
        };
        return;
      }
    }
  }

  async dispose(): Promise<void> {
    // No persistent resources
  }
}
