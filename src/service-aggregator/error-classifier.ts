/**
 * Provider Error Classification
 * Normalises failed responses and detects context-window overflows
 */

import type { AdapterError } from './types';
import { getRecord, getString, isRecord } from './stream-lines';

// ============================================================================
// Context Overflow Detection
// ============================================================================

const OVERFLOW_CODES = new Set([
  'context_length_exceeded',
  'string_above_max_length',
  'CONTEXT_LENGTH_EXCEEDED',
]);

const OVERFLOW_PATTERNS: RegExp[] = [
  /maximum context length/i,
  /context (window|length) (is )?(exceeded|too (small|long))/i,
  /exceeds? (the )?(model'?s? )?(maximum )?context/i,
  /prompt is too long/i,
  /too many (input )?tokens/i,
  /(input|prompt|context)\b[^.]*\btoken limit/i,
  /token limit\b[^.]*\b(input|prompt|context)/i,
  /input length .* exceeds/i,
];

/**
 * Whether a provider error means the prompt did not fit the context window
 */
export function isContextOverflow(error: Pick<AdapterError, 'code' | 'message'>): boolean {
  if (OVERFLOW_CODES.has(error.code)) {
    return true;
  }
  return OVERFLOW_PATTERNS.some(pattern => pattern.test(error.message));
}

// ============================================================================
// Error Responses
// ============================================================================

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Build an AdapterError from a non-2xx HTTP response.
 * Understands `{ error: { code, type, message } }` and `{ error: "text" }` bodies.
 */
export async function readErrorResponse(response: Response, provider: string): Promise<AdapterError> {
  let body: unknown;
  try {
    body = await response.json();
  } catch {
    body = undefined;
  }

  let code = `HTTP_${response.status}`;
  let message = response.statusText || `Request failed with status ${response.status}`;

  if (isRecord(body)) {
    const nested = getRecord(body, 'error');
    const flat = getString(body, 'error');

    if (nested) {
      code = getString(nested, 'code') ?? getString(nested, 'type') ?? code;
      message = getString(nested, 'message') ?? message;
    } else if (flat) {
      message = flat;
    } else {
      message = getString(body, 'message') ?? message;
    }
  }

  return {
    code,
    message,
    provider,
    retryable: isRetryableStatus(response.status),
    statusCode: response.status,
    details: body,
  };
}

/**
 * Build an AdapterError for a thrown fetch/stream failure
 */
export function toTransportError(error: unknown, provider: string, signal?: AbortSignal): AdapterError {
  if (signal?.aborted || (error instanceof Error && error.name === 'AbortError')) {
    return {
      code: 'REQUEST_ABORTED',
      message: 'Request was aborted',
      provider,
      retryable: false,
    };
  }

  return {
    code: 'NETWORK_ERROR',
    message: error instanceof Error ? error.message : String(error),
    provider,
    retryable: true,
  };
}
