/**
 * Generation Worker - Main Class
 *
 * Runs one generation task on a background async loop: iterates the
 * aggregator stream, forwards chunks in arrival order and delivers the
 * terminal `finished` notification exactly once. Single-use: a worker that
 * reached a terminal state is discarded and a new one created per dispatch.
 */

import { DispatchError, GenerationError, TokenLimitError, WorkerStateError, toError } from '../errors';
import { EventBus, type EventHandler, type UnsubscribeFn } from '../event-bus';
import { createLogger, type Logger } from '../logger';
import type { FinalPrompt, PromptConfig } from '../prompt-assembler/types';
import type { ServiceAggregator } from '../service-aggregator/types';
import { workerStateMachine } from './state-machine';
import { generateTaskId } from './task-id-generator';
import type {
  GenerationTask,
  GenerationWorkerOptions,
  StopResult,
  WorkerEvents,
  WorkerOutcome,
  WorkerState,
} from './types';

export const DEFAULT_STOP_GRACE_MS = 5000;

export function freezeConfig(config: PromptConfig): Readonly<PromptConfig> {
  return Object.freeze({
    ...config,
    providerOverrides: Object.freeze({ ...config.providerOverrides }),
  });
}

// ============================================================================
// Generation Worker
// ============================================================================

export class GenerationWorker {
  readonly id: string;

  /** Settles with the terminal outcome; never rejects */
  readonly done: Promise<WorkerOutcome>;

  private currentState: WorkerState = 'idle';
  private prompt: FinalPrompt = '';
  private config: Readonly<PromptConfig> | null = null;
  private chunks: string[] = [];

  private silenced = false;
  private loop: Promise<void> | null = null;
  private stopping: Promise<StopResult> | null = null;
  private outcome: WorkerOutcome | null = null;
  private resolveDone: (outcome: WorkerOutcome) => void = () => undefined;

  private readonly controller = new AbortController();
  private readonly events: EventBus<WorkerEvents>;
  private readonly aggregator: ServiceAggregator;
  private readonly stopGraceMs: number;
  private readonly logger: Logger;

  constructor(aggregator: ServiceAggregator, options: GenerationWorkerOptions = {}) {
    this.aggregator = aggregator;
    this.id = options.taskId ?? generateTaskId();
    this.stopGraceMs = options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
    this.logger = options.logger ?? createLogger('worker');
    this.events = new EventBus<WorkerEvents>(this.logger);
    this.done = new Promise(resolve => {
      this.resolveDone = resolve;
    });
  }

  // ============================================================================
  // Accessors
  // ============================================================================

  get state(): WorkerState {
    return this.currentState;
  }

  /**
   * Text streamed so far
   */
  get output(): string {
    return this.chunks.join('');
  }

  get task(): GenerationTask | null {
    if (!this.config) {
      return null;
    }
    return { id: this.id, prompt: this.prompt, config: this.config, state: this.currentState };
  }

  // ============================================================================
  // Subscriptions
  // ============================================================================

  on<K extends keyof WorkerEvents>(event: K, handler: EventHandler<WorkerEvents[K]>): UnsubscribeFn {
    return this.events.on(event, handler);
  }

  once<K extends keyof WorkerEvents>(event: K, handler: EventHandler<WorkerEvents[K]>): UnsubscribeFn {
    return this.events.once(event, handler);
  }

  off<K extends keyof WorkerEvents>(event: K, handler: EventHandler<WorkerEvents[K]>): void {
    this.events.off(event, handler);
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Begin streaming. Returns immediately; results arrive as events.
   */
  start(prompt: FinalPrompt, config: PromptConfig): GenerationTask {
    if (this.currentState !== 'idle') {
      throw new WorkerStateError(this.id, this.currentState, 'start');
    }

    this.prompt = prompt;
    this.config = freezeConfig(config);
    this.transition('running');

    this.loop = this.run(this.prompt, this.config);

    return { id: this.id, prompt: this.prompt, config: this.config, state: this.currentState };
  }

  /**
   * Cancel the task. Chunks stop immediately and the terminal notification is
   * delivered before this returns; the promise reports whether the stream
   * loop exited within the grace period. Idempotent, never rejects.
   */
  stop(): Promise<StopResult> {
    if (this.stopping) {
      return this.stopping;
    }

    if (this.currentState === 'idle') {
      return Promise.resolve({ settled: true });
    }

    if (this.currentState === 'running') {
      this.silenced = true;
      this.controller.abort();
      this.interruptAggregator();
      this.transition('cancelled');
      this.emitFinished();
    }

    this.stopping = this.waitForLoop();
    return this.stopping;
  }

  // ============================================================================
  // Stream Loop
  // ============================================================================

  private async run(prompt: FinalPrompt, config: Readonly<PromptConfig>): Promise<void> {
    try {
      const stream = this.aggregator.generate(prompt, config, { signal: this.controller.signal });

      for await (const text of stream) {
        if (this.silenced) {
          break;
        }
        this.chunks.push(text);
        this.events.emit('chunk', { taskId: this.id, text, index: this.chunks.length - 1 });
      }

      if (!this.silenced) {
        this.transition('completed');
        this.emitFinished();
      }
    } catch (error) {
      if (this.silenced) {
        this.logger.debug(`Task ${this.id} stream ended after stop: ${toError(error).message}`);
        return;
      }
      this.fail(error);
    }
  }

  private fail(cause: unknown): void {
    this.transition('failed');

    if (cause instanceof TokenLimitError) {
      this.logger.debug(`Task ${this.id} exceeded the token limit: ${cause.rawMessage}`);
      this.events.emit('tokenLimitExceeded', { taskId: this.id, error: cause, partialOutput: this.output });
    } else {
      const error = cause instanceof DispatchError ? cause : this.wrapError(cause);
      this.logger.warn(`Task ${this.id} failed: ${error.message}`);
      this.events.emit('error', { taskId: this.id, error });
    }

    this.emitFinished();
  }

  private wrapError(cause: unknown): GenerationError {
    const error = toError(cause);
    return new GenerationError(error.message, { context: { cause: error.name, taskId: this.id } });
  }

  private emitFinished(): void {
    const state = this.currentState;
    if (this.outcome || !workerStateMachine.isTerminal(state)) {
      return;
    }

    const text = this.output;
    const outcome: WorkerOutcome = { taskId: this.id, state, text, empty: text.trim().length === 0 };
    this.outcome = outcome;

    if (state === 'completed' && outcome.empty) {
      this.logger.warn(`Task ${this.id} completed without any text`);
    }

    this.resolveDone(outcome);
    this.events.emit('finished', outcome);
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private transition(to: WorkerState): void {
    const from = this.currentState;
    this.currentState = workerStateMachine.transition(from, to);
    this.logger.debug(`Task ${this.id}: ${from} -> ${to}`);
  }

  private interruptAggregator(): void {
    try {
      this.aggregator.interrupt();
    } catch (error) {
      this.logger.warn(`Interrupt failed for task ${this.id}: ${toError(error).message}`);
    }
  }

  private waitForLoop(): Promise<StopResult> {
    const loop = this.loop;
    if (!loop) {
      return Promise.resolve({ settled: true });
    }

    return new Promise<StopResult>(resolve => {
      const timer = setTimeout(() => {
        this.logger.warn(`Task ${this.id} did not exit within ${this.stopGraceMs}ms of stop`);
        resolve({ settled: false });
      }, this.stopGraceMs);
      timer.unref();

      loop.then(
        () => {
          clearTimeout(timer);
          resolve({ settled: true });
        },
        (error: unknown) => {
          clearTimeout(timer);
          this.logger.error(`Task ${this.id} loop rejected: ${toError(error).message}`);
          resolve({ settled: true });
        }
      );
    });
  }
}
