/**
 * Error Types
 *
 * Error hierarchy for prompt dispatch, generation and recovery.
 */

import type { FinalPrompt, PromptConfig } from './prompt-assembler/types';

/**
 * Base error class for all dispatch errors
 */
export class DispatchError extends Error {
  public code: string;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Generation Errors
// ============================================================================

/**
 * Any generation failure that is not a context-window overflow
 * (network failure, malformed response, provider error).
 */
export class GenerationError extends DispatchError {
  public readonly provider?: string;
  public readonly statusCode?: number;

  constructor(
    message: string,
    options: { code?: string; provider?: string; statusCode?: number; context?: Record<string, unknown> } = {}
  ) {
    super(message, options.code ?? 'GENERATION_ERROR', options.context);
    this.provider = options.provider;
    this.statusCode = options.statusCode;
  }
}

/**
 * The prompt exceeded the provider's context window.
 * Carries everything needed to rebuild and retry the request.
 */
export class TokenLimitError extends DispatchError {
  public readonly rawMessage: string;
  public readonly attemptedPrompt: FinalPrompt;
  public readonly promptConfig: PromptConfig;

  constructor(rawMessage: string, attemptedPrompt: FinalPrompt, promptConfig: PromptConfig) {
    super(`Token limit exceeded: ${rawMessage}`, 'TOKEN_LIMIT_EXCEEDED', {
      promptTemplateId: promptConfig.promptTemplateId,
    });
    this.rawMessage = rawMessage;
    this.attemptedPrompt = attemptedPrompt;
    this.promptConfig = promptConfig;
  }
}

// ============================================================================
// Lifecycle Errors
// ============================================================================

export class WorkerStateError extends DispatchError {
  constructor(taskId: string, state: string, operation: string) {
    super(`Cannot ${operation} task ${taskId} in state "${state}"`, 'WORKER_STATE_ERROR', {
      taskId,
      state,
      operation,
    });
  }
}

export class PromptAssemblyError extends DispatchError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PROMPT_ASSEMBLY_ERROR', context);
  }
}

export class DispatchValidationError extends DispatchError {
  public readonly issues: Array<{ field: string; message: string }>;

  constructor(message: string, issues: Array<{ field: string; message: string }>) {
    super(message, 'DISPATCH_VALIDATION_ERROR', { issues });
    this.issues = issues;
  }
}

// ============================================================================
// Recovery Errors
// ============================================================================

export class RecoveryError extends DispatchError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'RECOVERY_ERROR', context);
  }
}

/**
 * Every remediation strategy was tried and the prompt still does not fit.
 */
export class RecoveryExhaustedError extends DispatchError {
  public readonly lastError: TokenLimitError;

  constructor(originTaskId: string, lastError: TokenLimitError) {
    super(
      `Prompt still exceeds the context window after recovery: ${lastError.rawMessage}`,
      'RECOVERY_EXHAUSTED',
      { originTaskId }
    );
    this.lastError = lastError;
  }
}

export class ConfigError extends DispatchError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : String(value));
}
