/**
 * Token Estimator
 *
 * Counts tokens with the cl100k_base byte-pair encoding (tiktoken).
 *
 * Two views of the same scheme:
 * - encode/decode/tail work on the raw BPE token stream and are used to cut
 *   truncation windows.
 * - estimate() is the budget count. Text is split into chunks that close where
 *   whitespace meets non-whitespace; a chunk of up to 64 UTF-16 units costs the
 *   largest BPE count among its prefixes, a longer one costs its UTF-8 byte
 *   length. Appending text can therefore never lower the estimate, which raw
 *   BPE counts do not guarantee when an append merges into the last word.
 */

import { get_encoding, type Tiktoken, type TiktokenEncoding } from 'tiktoken';

// ============================================================================
// Types
// ============================================================================

export interface TokenEstimatorOptions {
  encoding?: TiktokenEncoding;
  /** Chunks longer than this are costed by byte length */
  maxPrefixChunkLength?: number;
  /** Max cached chunk costs before the cache is cleared */
  cacheSize?: number;
}

export interface TailWindow {
  text: string;
  /** BPE tokens in the window */
  tokenCount: number;
  /** BPE tokens in the full input */
  totalTokens: number;
  truncated: boolean;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_ENCODING: TiktokenEncoding = 'cl100k_base';
const DEFAULT_MAX_PREFIX_CHUNK_LENGTH = 64;
const DEFAULT_CACHE_SIZE = 10_000;

// Leading whitespace run, then non-whitespace followed by trailing whitespace
const CHUNK_PATTERN = /^\s+|\S+\s*/g;

// ============================================================================
// Token Estimator
// ============================================================================

export class TokenEstimator {
  readonly encodingName: TiktokenEncoding;
  private encoder: Tiktoken | null;
  private decoder = new TextDecoder('utf-8');
  private maxPrefixChunkLength: number;
  private cacheSize: number;
  private chunkCosts: Map<string, number> = new Map();

  constructor(options: TokenEstimatorOptions = {}) {
    this.encodingName = options.encoding ?? DEFAULT_ENCODING;
    this.maxPrefixChunkLength = options.maxPrefixChunkLength ?? DEFAULT_MAX_PREFIX_CHUNK_LENGTH;
    this.cacheSize = options.cacheSize ?? DEFAULT_CACHE_SIZE;
    this.encoder = get_encoding(this.encodingName);
  }

  // ==========================================================================
  // Budget Estimate
  // ==========================================================================

  /**
   * Deterministic, monotonic token count used for budget decisions
   */
  estimate(text: string): number {
    if (!text) return 0;

    let total = 0;
    for (const match of text.matchAll(CHUNK_PATTERN)) {
      total += this.chunkCost(match[0]);
    }
    return total;
  }

  /**
   * Whether text fits within a token budget
   */
  fits(text: string, budget: number): boolean {
    return this.estimate(text) <= budget;
  }

  private chunkCost(chunk: string): number {
    const cached = this.chunkCosts.get(chunk);
    if (cached !== undefined) {
      return cached;
    }

    let cost: number;
    if (chunk.length > this.maxPrefixChunkLength) {
      cost = Buffer.byteLength(chunk, 'utf8');
    } else {
      cost = 0;
      for (let end = 1; end <= chunk.length; end++) {
        cost = Math.max(cost, this.count(chunk.slice(0, end)));
      }
    }

    if (this.chunkCosts.size >= this.cacheSize) {
      this.chunkCosts.clear();
    }
    this.chunkCosts.set(chunk, cost);
    return cost;
  }

  // ==========================================================================
  // Raw BPE Stream
  // ==========================================================================

  /**
   * Exact BPE token count (special tokens are treated as plain text)
   */
  count(text: string): number {
    if (!text) return 0;
    return this.getEncoder().encode_ordinary(text).length;
  }

  encode(text: string): number[] {
    return Array.from(this.getEncoder().encode_ordinary(text));
  }

  decode(tokens: readonly number[]): string {
    return this.decodeArray(Uint32Array.from(tokens));
  }

  private decodeArray(tokens: Uint32Array): string {
    if (tokens.length === 0) return '';
    return this.decoder.decode(this.getEncoder().decode(tokens));
  }

  /**
   * Trailing window of at most maxTokens BPE tokens, decoded back to text.
   * Leading tokens that decode to a partial character are dropped so the
   * result is always a suffix of the input.
   */
  tail(text: string, maxTokens: number): TailWindow {
    const limit = Math.max(0, Math.floor(maxTokens));
    const tokens = this.getEncoder().encode_ordinary(text);
    const totalTokens = tokens.length;

    if (totalTokens <= limit) {
      return { text, tokenCount: totalTokens, totalTokens, truncated: false };
    }

    for (let start = totalTokens - limit; start < totalTokens; start++) {
      const window = this.decodeArray(tokens.subarray(start));
      if (text.endsWith(window)) {
        return { text: window, tokenCount: totalTokens - start, totalTokens, truncated: true };
      }
    }

    return { text: '', tokenCount: 0, totalTokens, truncated: true };
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Release the encoder's native memory. The estimator is unusable afterwards.
   */
  dispose(): void {
    this.encoder?.free();
    this.encoder = null;
    this.chunkCosts.clear();
  }

  private getEncoder(): Tiktoken {
    if (!this.encoder) {
      throw new Error('TokenEstimator has been disposed');
    }
    return this.encoder;
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createTokenEstimator(options: TokenEstimatorOptions = {}): TokenEstimator {
  return new TokenEstimator(options);
}
