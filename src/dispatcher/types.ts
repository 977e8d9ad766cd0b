/**
 * Prompt Dispatcher Types
 */

import type { TiktokenEncoding } from 'tiktoken';
import type { Logger } from '../logger';
import type { ChunkEvent, TokenLimitEvent, WorkerOutcome } from '../generation-worker/types';
import type { AdditionalVariables, PromptConfig } from '../prompt-assembler/types';
import type { ServiceAggregator } from '../service-aggregator/types';
import type { RecoveryConfig, RecoveryEvent, Summarizer, TailTokenizer } from '../token-limit-recovery/types';

// ============================================================================
// Requests
// ============================================================================

export interface DispatchRequest {
  /** Must not be blank */
  actionBeats: string;
  promptConfig: PromptConfig;
  additionalVars?: AdditionalVariables;
  currentDocumentText?: string | null;
  extraContext?: string | null;
  /** Previously saved summary of the document, tried first on overflow */
  cachedSummary?: string | null;
}

// ============================================================================
// Events
// ============================================================================

export interface DispatchErrorEvent {
  taskId: string;
  error: Error;
}

export interface DispatcherEvents {
  chunk: ChunkEvent;
  finished: WorkerOutcome;
  tokenLimitExceeded: TokenLimitEvent;
  error: DispatchErrorEvent;
  recovery: RecoveryEvent;
}

// ============================================================================
// Configuration
// ============================================================================

export interface PromptDispatcherConfig {
  worker: {
    stopGraceMs: number;
  };
  recovery: RecoveryConfig;
  tokenizer: {
    encoding: TiktokenEncoding;
  };
}

export type PromptDispatcherConfigInput = {
  [K in keyof PromptDispatcherConfig]?: Partial<PromptDispatcherConfig[K]>;
};

export interface PromptDispatcherDependencies {
  aggregator: ServiceAggregator;
  /** Defaults to a ServiceSummarizer over the aggregator; null disables auto-summary */
  summarizer?: Summarizer | null;
  /** Defaults to a TokenEstimator created on first truncation */
  tokenizer?: TailTokenizer;
  logger?: Logger;
}
