/**
 * Token Limit Recovery
 *
 * Retry policy for a prompt that overflowed the provider's context window.
 * One flow per originating task:
 *
 *   cached summary  -> re-dispatch once with the summary as the document
 *   no cached one   -> auto-summarize under a hard timer
 *                        summary in time  -> re-dispatch
 *                        timer first      -> hand the best text to the user
 *   retry overflows -> manual: user summary, or a truncated document tail
 *   truncation overflows -> exhausted
 *
 * A new incident supersedes the running flow; late summaries and timers of
 * a superseded flow do nothing.
 */

import { RecoveryError, RecoveryExhaustedError, toError, type TokenLimitError } from '../errors';
import { generateTaskId } from '../generation-worker/task-id-generator';
import { createLogger, type Logger } from '../logger';
import { resolveMaxTokens } from '../prompt-assembler/overrides';
import type {
  RecoverableRequest,
  RecoveryConfig,
  RecoveryHost,
  RecoveryState,
  RetryStrategy,
  Summarizer,
  TailTokenizer,
  TokenLimitIncident,
  TokenLimitRecoveryDependencies,
} from './types';

// ============================================================================
// Configuration
// ============================================================================

export const DEFAULT_RECOVERY_CONFIG: RecoveryConfig = {
  summaryTimeoutMs: 30000,
  truncationRatio: 0.5,
  defaultMaxTokens: 2000,
};

type FlowState = Exclude<RecoveryState, 'idle' | 'disposed'>;

/** States in which the user may pick a manual strategy */
const ACCEPTS_INPUT: ReadonlySet<FlowState> = new Set<FlowState>(['summarizing', 'awaiting_user', 'exhausted']);

interface RecoveryFlow {
  originTaskId: string;
  request: RecoverableRequest;
  state: FlowState;
  lastError: TokenLimitError;
  partialOutput: string;
  retryTaskId: string | null;
  lastStrategy: RetryStrategy | null;
  summaryController: AbortController | null;
  timer: NodeJS.Timeout | null;
  partialSummary: string;
}

// ============================================================================
// Token Limit Recovery
// ============================================================================

export class TokenLimitRecovery {
  private flow: RecoveryFlow | null = null;
  private disposed = false;

  private readonly host: RecoveryHost;
  private readonly tokenizer: TailTokenizer;
  private readonly summarizer?: Summarizer;
  private readonly config: RecoveryConfig;
  private readonly logger: Logger;

  constructor(deps: TokenLimitRecoveryDependencies, config: Partial<RecoveryConfig> = {}) {
    this.host = deps.host;
    this.tokenizer = deps.tokenizer;
    this.summarizer = deps.summarizer;
    this.logger = deps.logger ?? createLogger('recovery');
    this.config = { ...DEFAULT_RECOVERY_CONFIG, ...config };
  }

  get state(): RecoveryState {
    if (this.disposed) {
      return 'disposed';
    }
    return this.flow?.state ?? 'idle';
  }

  get originTaskId(): string | null {
    return this.flow?.originTaskId ?? null;
  }

  /**
   * Task id of the retry currently running for this flow
   */
  get retryTaskId(): string | null {
    return this.flow?.retryTaskId ?? null;
  }

  // ============================================================================
  // Incidents
  // ============================================================================

  handle(incident: TokenLimitIncident): void {
    if (this.disposed) {
      this.logger.debug(`Ignoring token limit of ${incident.taskId}: recovery disposed`);
      return;
    }

    const current = this.flow;
    if (current && current.retryTaskId === incident.taskId) {
      this.handleRetryOverflow(current, incident);
      return;
    }

    this.reset();

    const flow: RecoveryFlow = {
      originTaskId: incident.taskId,
      request: incident.request,
      state: 'awaiting_user',
      lastError: incident.error,
      partialOutput: incident.partialOutput,
      retryTaskId: null,
      lastStrategy: null,
      summaryController: null,
      timer: null,
      partialSummary: '',
    };
    this.flow = flow;

    const cached = incident.request.cachedSummary?.trim() ?? '';
    if (cached.length > 0) {
      this.logger.debug(`Retrying ${flow.originTaskId} with the cached summary`);
      this.autoRetry(flow, 'cached_summary', cached);
      return;
    }

    this.startSummary(flow);
  }

  /**
   * A task finished without overflowing; closes the flow if it was our retry
   */
  settle(taskId: string, completed: boolean): void {
    const flow = this.flow;
    if (!flow || flow.retryTaskId !== taskId) {
      return;
    }

    flow.retryTaskId = null;
    if (completed) {
      flow.state = 'resolved';
      this.logger.debug(`Recovery for ${flow.originTaskId} resolved by ${taskId}`);
    } else {
      this.logger.debug(`Retry ${taskId} ended without output; dropping recovery for ${flow.originTaskId}`);
      this.flow = null;
    }
  }

  private handleRetryOverflow(flow: RecoveryFlow, incident: TokenLimitIncident): void {
    flow.retryTaskId = null;
    flow.lastError = incident.error;
    flow.partialOutput = incident.partialOutput;

    if (flow.lastStrategy === 'truncated') {
      flow.state = 'exhausted';
      const error = new RecoveryExhaustedError(flow.originTaskId, incident.error);
      this.logger.warn(error.message);
      this.host.notify({ type: 'exhausted', originTaskId: flow.originTaskId, error });
      return;
    }

    this.logger.debug(`Retry ${incident.taskId} (${flow.lastStrategy}) overflowed again`);
    this.requireManual(flow);
  }

  // ============================================================================
  // Automatic Summary
  // ============================================================================

  private startSummary(flow: RecoveryFlow): void {
    const summarizer = this.summarizer;
    const document = this.documentOf(flow);
    if (!summarizer || document.length === 0) {
      this.requireManual(flow);
      return;
    }

    const controller = new AbortController();
    flow.state = 'summarizing';
    flow.summaryController = controller;
    flow.timer = setTimeout(() => this.onSummaryTimeout(flow), this.config.summaryTimeoutMs);

    this.logger.debug(`Summarizing the document of ${flow.originTaskId}`);
    this.host.notify({
      type: 'summarizing',
      originTaskId: flow.originTaskId,
      timeoutMs: this.config.summaryTimeoutMs,
    });

    const summary = new Promise<string>(resolve => {
      resolve(
        summarizer.summarize(document, {
          signal: controller.signal,
          providerOverrides: flow.request.promptConfig.providerOverrides,
          onPartial: text => {
            if (this.isCurrent(flow, 'summarizing')) {
              flow.partialSummary = text;
            }
          },
        })
      );
    });

    summary.then(
      text => this.onSummary(flow, text),
      (error: unknown) => this.onSummaryFailed(flow, error)
    );
  }

  private onSummary(flow: RecoveryFlow, text: string): void {
    if (!this.isCurrent(flow, 'summarizing')) {
      this.logger.debug(`Ignoring late summary for ${flow.originTaskId}`);
      return;
    }
    this.clearSummary(flow);

    const summary = text.trim();
    if (summary.length === 0) {
      this.logger.warn(`Summarizer returned no text for ${flow.originTaskId}`);
      this.requireManual(flow);
      return;
    }

    this.autoRetry(flow, 'auto_summary', summary);
  }

  private onSummaryFailed(flow: RecoveryFlow, cause: unknown): void {
    if (!this.isCurrent(flow, 'summarizing')) {
      this.logger.debug(`Ignoring summarizer failure of a finished flow ${flow.originTaskId}`);
      return;
    }
    this.clearSummary(flow);

    this.logger.warn(`Summarizer failed for ${flow.originTaskId}: ${toError(cause).message}`);
    this.requireManual(flow);
  }

  private onSummaryTimeout(flow: RecoveryFlow): void {
    flow.timer = null;
    if (!this.isCurrent(flow, 'summarizing')) {
      return;
    }
    this.clearSummary(flow);
    flow.state = 'awaiting_user';

    const partial = flow.partialSummary.trim();
    this.logger.warn(`Summary for ${flow.originTaskId} timed out after ${this.config.summaryTimeoutMs}ms`);
    this.host.notify({
      type: 'summaryForReview',
      originTaskId: flow.originTaskId,
      text: partial.length > 0 ? partial : this.documentOf(flow),
      source: partial.length > 0 ? 'partial_summary' : 'document',
    });
  }

  // ============================================================================
  // Manual Strategies
  // ============================================================================

  /**
   * Re-dispatch with a user-supplied summary in place of the document
   * @returns id of the new task
   */
  useSummary(text: string): string {
    const flow = this.requireInput('retry with a summary');
    const summary = text.trim();
    if (summary.length === 0) {
      throw new RecoveryError('Summary text is empty', { originTaskId: flow.originTaskId });
    }

    this.clearSummary(flow);
    return this.retry(flow, 'manual_summary', summary);
  }

  /**
   * Re-dispatch keeping only the tail of the document
   * @returns id of the new task
   */
  truncate(): string {
    const flow = this.requireInput('truncate the context');
    this.clearSummary(flow);

    const maxTokens = this.maxTokensOf(flow);
    const budget = Math.floor(maxTokens * this.config.truncationRatio);
    const window = this.tokenizer.tail(flow.request.currentDocumentText ?? '', budget);

    this.logger.debug(
      `Truncating the document of ${flow.originTaskId} to ${window.tokenCount}/${window.totalTokens} tokens`
    );
    return this.retry(flow, 'truncated', window.text);
  }

  private requireInput(operation: string): RecoveryFlow {
    if (this.disposed) {
      throw new RecoveryError(`Cannot ${operation}: recovery has been disposed`);
    }

    const flow = this.flow;
    if (!flow || !ACCEPTS_INPUT.has(flow.state)) {
      throw new RecoveryError(`Cannot ${operation}: no token-limit recovery is waiting for input`, {
        state: this.state,
      });
    }
    return flow;
  }

  private requireManual(flow: RecoveryFlow): void {
    flow.state = 'awaiting_user';
    this.host.notify({
      type: 'manualInterventionRequired',
      originTaskId: flow.originTaskId,
      rawMessage: flow.lastError.rawMessage,
      partialOutput: flow.partialOutput,
      maxTokens: this.maxTokensOf(flow),
    });
  }

  // ============================================================================
  // Retry
  // ============================================================================

  private retry(flow: RecoveryFlow, strategy: RetryStrategy, documentText: string): string {
    const taskId = generateTaskId();
    flow.state = 'retrying';
    flow.lastStrategy = strategy;
    flow.retryTaskId = taskId;

    this.host.notify({ type: 'retrying', originTaskId: flow.originTaskId, strategy, taskId });

    try {
      this.host.dispatchRetry({
        taskId,
        originTaskId: flow.originTaskId,
        strategy,
        request: flow.request,
        documentText,
      });
    } catch (error) {
      if (this.flow === flow && flow.retryTaskId === taskId) {
        flow.retryTaskId = null;
        flow.state = 'awaiting_user';
      }
      throw error;
    }

    return taskId;
  }

  /**
   * Retry started by the policy itself; a failed dispatch falls back to manual
   */
  private autoRetry(flow: RecoveryFlow, strategy: RetryStrategy, documentText: string): void {
    try {
      this.retry(flow, strategy, documentText);
    } catch (error) {
      this.logger.error(`Automatic ${strategy} retry of ${flow.originTaskId} failed: ${toError(error).message}`);
      if (this.flow === flow) {
        this.requireManual(flow);
      }
    }
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Drop the running flow; its summary and timer become no-ops
   */
  reset(): void {
    const flow = this.flow;
    if (!flow) {
      return;
    }
    this.clearSummary(flow);
    this.flow = null;
    this.logger.debug(`Recovery for ${flow.originTaskId} superseded`);
  }

  dispose(): void {
    this.reset();
    this.disposed = true;
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private isCurrent(flow: RecoveryFlow, state: FlowState): boolean {
    return !this.disposed && this.flow === flow && flow.state === state;
  }

  private clearSummary(flow: RecoveryFlow): void {
    if (flow.timer) {
      clearTimeout(flow.timer);
      flow.timer = null;
    }
    if (flow.summaryController) {
      flow.summaryController.abort();
      flow.summaryController = null;
    }
  }

  private documentOf(flow: RecoveryFlow): string {
    return flow.request.currentDocumentText?.trim() ?? '';
  }

  private maxTokensOf(flow: RecoveryFlow): number {
    return resolveMaxTokens(flow.request.promptConfig.providerOverrides, this.config.defaultMaxTokens);
  }
}
