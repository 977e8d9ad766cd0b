/**
 * Stream Line Reader
 * Splits a byte stream into text lines for SSE and NDJSON parsing
 */

import { createLogger } from '../logger';

const logger = createLogger('stream-lines');

export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let finished = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        yield line.endsWith('\r') ? line.slice(0, -1) : line;
      }
    }

    buffer += decoder.decode();
    if (buffer.length > 0) {
      yield buffer;
    }
    finished = true;
  } finally {
    if (!finished) {
      // Consumer stopped early or the read failed: close the connection
      await reader.cancel().catch((error: unknown) => {
        logger.debug('Stream cancel failed', error);
      });
    }
    reader.releaseLock();
  }
}

/**
 * Yield the payload of each `data:` line of a server-sent event stream
 */
export async function* readSSEData(stream: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  for await (const line of readLines(stream)) {
    if (line.startsWith('data:')) {
      yield line.slice(5).trimStart();
    }
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

export function getNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' ? value : undefined;
}

export function getRecord(record: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = record[key];
  return isRecord(value) ? value : undefined;
}

/**
 * Parse JSON, returning undefined instead of throwing
 */
export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
