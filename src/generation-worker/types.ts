/**
 * Generation Worker Types
 */

import type { TokenLimitError } from '../errors';
import type { Logger } from '../logger';
import type { FinalPrompt, PromptConfig } from '../prompt-assembler/types';

// ============================================================================
// State
// ============================================================================

export type WorkerState = 'idle' | 'running' | 'completed' | 'failed' | 'cancelled';

export type TerminalState = Extract<WorkerState, 'completed' | 'failed' | 'cancelled'>;

export interface GenerationTask {
  id: string;
  prompt: FinalPrompt;
  config: Readonly<PromptConfig>;
  state: WorkerState;
}

// ============================================================================
// Notifications
// ============================================================================

export interface ChunkEvent {
  taskId: string;
  text: string;
  /** Zero-based position of this chunk within the task */
  index: number;
}

export interface TokenLimitEvent {
  taskId: string;
  error: TokenLimitError;
  /** Text streamed before the overflow was reported */
  partialOutput: string;
}

export interface WorkerErrorEvent {
  taskId: string;
  error: Error;
}

/**
 * Terminal notification, delivered exactly once per task
 */
export interface WorkerOutcome {
  taskId: string;
  state: TerminalState;
  text: string;
  /** The service returned no text at all */
  empty: boolean;
}

export interface WorkerEvents {
  chunk: ChunkEvent;
  tokenLimitExceeded: TokenLimitEvent;
  error: WorkerErrorEvent;
  finished: WorkerOutcome;
}

// ============================================================================
// Options
// ============================================================================

export interface GenerationWorkerOptions {
  /** How long stop() waits for the stream loop to exit */
  stopGraceMs?: number;
  taskId?: string;
  logger?: Logger;
}

export interface StopResult {
  /** The stream loop exited within the grace period */
  settled: boolean;
}
