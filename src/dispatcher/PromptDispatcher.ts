/**
 * Prompt Dispatcher
 *
 * Main facade used by the editor: assembles the prompt, owns the single
 * active-worker slot and drives token-limit recovery.
 */

import { RecoveryError, toError } from '../errors';
import { EventBus, type EventHandler, type UnsubscribeFn } from '../event-bus';
import { DEFAULT_STOP_GRACE_MS, GenerationWorker, freezeConfig } from '../generation-worker/GenerationWorker';
import type { GenerationTask, StopResult, TokenLimitEvent } from '../generation-worker/types';
import { createLogger, type Logger } from '../logger';
import { assemble } from '../prompt-assembler/assembler';
import type { FinalPrompt, PromptConfig } from '../prompt-assembler/types';
import type { ServiceAggregator } from '../service-aggregator/types';
import { DEFAULT_ENCODING, createTokenEstimator, type TailWindow, type TokenEstimator } from '../token-estimator';
import { ServiceSummarizer } from '../token-limit-recovery/service-summarizer';
import { DEFAULT_RECOVERY_CONFIG, TokenLimitRecovery } from '../token-limit-recovery/TokenLimitRecovery';
import type {
  RecoverableRequest,
  RecoveryEvent,
  RecoveryState,
  RetryPlan,
  TailTokenizer,
} from '../token-limit-recovery/types';
import { parseDispatchRequest } from './schema';
import type {
  DispatcherEvents,
  DispatchRequest,
  PromptDispatcherConfig,
  PromptDispatcherConfigInput,
  PromptDispatcherDependencies,
} from './types';

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: PromptDispatcherConfig = {
  worker: {
    stopGraceMs: DEFAULT_STOP_GRACE_MS,
  },
  recovery: DEFAULT_RECOVERY_CONFIG,
  tokenizer: {
    encoding: DEFAULT_ENCODING,
  },
};

// ============================================================================
// Prompt Dispatcher
// ============================================================================

export class PromptDispatcher {
  private config: PromptDispatcherConfig;
  private activeWorker: GenerationWorker | null = null;
  private estimator: TokenEstimator | null = null;
  private disposed = false;

  private readonly aggregator: ServiceAggregator;
  private readonly recovery: TokenLimitRecovery;
  private readonly events: EventBus<DispatcherEvents>;
  private readonly logger: Logger;

  constructor(dependencies: PromptDispatcherDependencies, config: PromptDispatcherConfigInput = {}) {
    this.config = this.mergeConfig(config);
    this.aggregator = dependencies.aggregator;
    this.logger = dependencies.logger ?? createLogger('dispatcher');
    this.events = new EventBus<DispatcherEvents>(this.logger);

    const summarizer =
      dependencies.summarizer === undefined ? new ServiceSummarizer(this.aggregator) : dependencies.summarizer ?? undefined;

    this.recovery = new TokenLimitRecovery(
      {
        host: {
          dispatchRetry: plan => this.dispatchRetry(plan),
          notify: event => this.onRecoveryEvent(event),
        },
        tokenizer: dependencies.tokenizer ?? this.lazyTokenizer(),
        summarizer,
        logger: this.logger.child('recovery'),
      },
      this.config.recovery
    );
  }

  // ============================================================================
  // Inbound API
  // ============================================================================

  /**
   * Assemble and start a new task, cancelling the previous one
   */
  dispatch(request: DispatchRequest): GenerationTask {
    this.assertUsable();

    const parsed = parseDispatchRequest(request);
    const prompt = assemble(
      parsed.promptConfig,
      parsed.actionBeats,
      parsed.additionalVars,
      parsed.currentDocumentText,
      parsed.extraContext
    );

    this.recovery.reset();
    return this.startTask(prompt, parsed.promptConfig, parsed);
  }

  /**
   * Stop the active task. Its `finished` notification is delivered before
   * the returned promise settles.
   */
  async cancel(): Promise<StopResult> {
    this.recovery.reset();

    const worker = this.activeWorker;
    if (!worker) {
      return { settled: true };
    }
    return worker.stop();
  }

  /**
   * Re-dispatch the overflowed request with a user-edited summary
   */
  retryWithSummary(summaryText: string): GenerationTask {
    this.assertUsable();
    return this.requireTask(this.recovery.useSummary(summaryText));
  }

  /**
   * Re-dispatch the overflowed request keeping only the tail of the document
   */
  retryWithTruncatedContext(): GenerationTask {
    this.assertUsable();
    return this.requireTask(this.recovery.truncate());
  }

  // ============================================================================
  // Subscriptions
  // ============================================================================

  on<K extends keyof DispatcherEvents>(event: K, handler: EventHandler<DispatcherEvents[K]>): UnsubscribeFn {
    return this.events.on(event, handler);
  }

  once<K extends keyof DispatcherEvents>(event: K, handler: EventHandler<DispatcherEvents[K]>): UnsubscribeFn {
    return this.events.once(event, handler);
  }

  off<K extends keyof DispatcherEvents>(event: K, handler: EventHandler<DispatcherEvents[K]>): void {
    this.events.off(event, handler);
  }

  // ============================================================================
  // State
  // ============================================================================

  get activeTask(): GenerationTask | null {
    return this.activeWorker?.task ?? null;
  }

  get recoveryState(): RecoveryState {
    return this.recovery.state;
  }

  getConfig(): PromptDispatcherConfig {
    return {
      worker: { ...this.config.worker },
      recovery: { ...this.config.recovery },
      tokenizer: { ...this.config.tokenizer },
    };
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.recovery.dispose();

    const worker = this.activeWorker;
    this.activeWorker = null;
    if (worker) {
      await worker.stop();
    }

    this.events.removeAllListeners();
    this.estimator?.dispose();
    this.estimator = null;
  }

  // ============================================================================
  // Task Slot
  // ============================================================================

  private startTask(
    prompt: FinalPrompt,
    config: PromptConfig,
    request: RecoverableRequest,
    taskId?: string
  ): GenerationTask {
    const worker = new GenerationWorker(this.aggregator, {
      taskId,
      stopGraceMs: this.config.worker.stopGraceMs,
      logger: this.logger.child('worker'),
    });

    // Swap the slot first so nothing from the previous worker is forwarded
    const previous = this.activeWorker;
    this.activeWorker = worker;
    this.bindWorker(worker, request);

    if (previous) {
      previous.stop().catch((error: unknown) => {
        this.logger.error(`Failed to stop task ${previous.id}: ${toError(error).message}`);
      });
    }

    // A `finished` handler may have dispatched again while the previous task stopped
    if (this.activeWorker !== worker) {
      return this.skipSuperseded(worker, prompt, config);
    }

    this.logger.debug(`Dispatching task ${worker.id}${previous ? ` (replacing ${previous.id})` : ''}`);
    return worker.start(prompt, config);
  }

  /**
   * Report a task that lost the slot before it started. The worker is never
   * started, so the aggregator sees no request for it.
   */
  private skipSuperseded(worker: GenerationWorker, prompt: FinalPrompt, config: PromptConfig): GenerationTask {
    this.logger.debug(`Task ${worker.id} superseded before it started`);
    this.events.emit('finished', { taskId: worker.id, state: 'cancelled', text: '', empty: true });
    return { id: worker.id, prompt, config: freezeConfig(config), state: 'cancelled' };
  }

  private bindWorker(worker: GenerationWorker, request: RecoverableRequest): void {
    let overflow: TokenLimitEvent | null = null;

    worker.on('chunk', event => {
      if (this.activeWorker === worker) this.events.emit('chunk', event);
    });

    worker.on('tokenLimitExceeded', event => {
      if (this.activeWorker !== worker) return;
      overflow = event;
      this.events.emit('tokenLimitExceeded', event);
    });

    worker.on('error', event => {
      if (this.activeWorker === worker) this.events.emit('error', event);
    });

    // Every task's terminal notification is forwarded, superseded ones included
    worker.on('finished', outcome => {
      this.events.emit('finished', outcome);
      if (this.activeWorker !== worker) return;

      const incident = overflow;
      if (incident) {
        this.recovery.handle({
          taskId: worker.id,
          request,
          error: incident.error,
          partialOutput: incident.partialOutput,
        });
      } else {
        this.recovery.settle(worker.id, outcome.state === 'completed');
      }
    });
  }

  private requireTask(taskId: string): GenerationTask {
    const task = this.activeWorker?.task;
    if (!task || task.id !== taskId) {
      throw new RecoveryError(`Retry task ${taskId} is not the active task`, { taskId });
    }
    return task;
  }

  // ============================================================================
  // Recovery Host
  // ============================================================================

  private dispatchRetry(plan: RetryPlan): void {
    const { request } = plan;
    const prompt = assemble(request.promptConfig, request.actionBeats, request.additionalVars, plan.documentText);

    this.logger.debug(`Retrying ${plan.originTaskId} as ${plan.taskId} (${plan.strategy})`);
    this.startTask(prompt, request.promptConfig, request, plan.taskId);
  }

  /**
   * Exhaustion is reported here only: every task involved already got its
   * `tokenLimitExceeded`, which excludes an `error` for the same task.
   */
  private onRecoveryEvent(event: RecoveryEvent): void {
    this.events.emit('recovery', event);
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private lazyTokenizer(): TailTokenizer {
    return {
      tail: (text: string, maxTokens: number): TailWindow => {
        if (!this.estimator) {
          this.estimator = createTokenEstimator({ encoding: this.config.tokenizer.encoding });
        }
        return this.estimator.tail(text, maxTokens);
      },
    };
  }

  private assertUsable(): void {
    if (this.disposed) {
      throw new RecoveryError('PromptDispatcher has been disposed');
    }
  }

  private mergeConfig(config: PromptDispatcherConfigInput): PromptDispatcherConfig {
    return {
      worker: {
        ...DEFAULT_CONFIG.worker,
        ...config.worker,
      },
      recovery: {
        ...DEFAULT_CONFIG.recovery,
        ...config.recovery,
      },
      tokenizer: {
        ...DEFAULT_CONFIG.tokenizer,
        ...config.tokenizer,
      },
    };
  }
}
