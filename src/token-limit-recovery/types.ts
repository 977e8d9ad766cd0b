/**
 * Token Limit Recovery Types
 */

import type { RecoveryExhaustedError, TokenLimitError } from '../errors';
import type { Logger } from '../logger';
import type { AdditionalVariables, PromptConfig, ProviderOverrides } from '../prompt-assembler/types';
import type { TailWindow } from '../token-estimator';

// ============================================================================
// Summarizer
// ============================================================================

export interface SummarizeOptions {
  signal: AbortSignal;
  /** Receives the summary accumulated so far while it streams */
  onPartial?: (text: string) => void;
  /** Provider settings of the task being recovered */
  providerOverrides?: ProviderOverrides;
}

export interface Summarizer {
  summarize(text: string, options: SummarizeOptions): Promise<string>;
}

// ============================================================================
// Flow
// ============================================================================

export type RecoveryState =
  | 'idle'
  | 'summarizing'
  | 'retrying'
  | 'awaiting_user'
  | 'resolved'
  | 'exhausted'
  | 'disposed';

export type RetryStrategy = 'cached_summary' | 'auto_summary' | 'manual_summary' | 'truncated';

/**
 * What the overflowing task was built from
 */
export interface RecoverableRequest {
  promptConfig: PromptConfig;
  actionBeats: string;
  additionalVars: AdditionalVariables;
  currentDocumentText?: string | null;
  extraContext?: string | null;
  cachedSummary?: string | null;
}

export interface TokenLimitIncident {
  taskId: string;
  request: RecoverableRequest;
  error: TokenLimitError;
  partialOutput: string;
}

/**
 * A re-dispatch with the document replaced
 */
export interface RetryPlan {
  /** Id the new task must run under */
  taskId: string;
  originTaskId: string;
  strategy: RetryStrategy;
  request: RecoverableRequest;
  documentText: string;
}

// ============================================================================
// Events
// ============================================================================

export type RecoveryEvent =
  | { type: 'summarizing'; originTaskId: string; timeoutMs: number }
  | { type: 'retrying'; originTaskId: string; strategy: RetryStrategy; taskId: string }
  | { type: 'summaryForReview'; originTaskId: string; text: string; source: 'partial_summary' | 'document' }
  | {
      type: 'manualInterventionRequired';
      originTaskId: string;
      rawMessage: string;
      partialOutput: string;
      maxTokens: number;
    }
  | { type: 'exhausted'; originTaskId: string; error: RecoveryExhaustedError };

// ============================================================================
// Collaborators
// ============================================================================

export interface RecoveryHost {
  /** Start a fresh task for the plan */
  dispatchRetry(plan: RetryPlan): void;
  notify(event: RecoveryEvent): void;
}

export interface TailTokenizer {
  tail(text: string, maxTokens: number): TailWindow;
}

export interface RecoveryConfig {
  /** Hard limit for the automatic summary, not renewed */
  summaryTimeoutMs: number;
  /** Share of the completion budget kept when truncating the document */
  truncationRatio: number;
  /** Completion budget when the prompt config names none */
  defaultMaxTokens: number;
}

export interface TokenLimitRecoveryDependencies {
  host: RecoveryHost;
  tokenizer: TailTokenizer;
  summarizer?: Summarizer;
  logger?: Logger;
}
