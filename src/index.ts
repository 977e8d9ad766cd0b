/**
 * Prose Dispatch
 *
 * Main entry point: prompt assembly, streaming generation workers and
 * token-limit recovery behind a single dispatcher.
 */

// Errors & logging
export {
  DispatchError,
  GenerationError,
  TokenLimitError,
  WorkerStateError,
  PromptAssemblyError,
  DispatchValidationError,
  RecoveryError,
  RecoveryExhaustedError,
  ConfigError,
  toError,
} from './errors';
export { createLogger, setLogLevel, getLogLevel } from './logger';
export type { Logger, LogLevel } from './logger';

// Event Bus
export { EventBus } from './event-bus';
export type { ErrorHandler, EventHandler, UnsubscribeFn } from './event-bus';

// Module 1: Prompt Assembler
export * from './prompt-assembler';

// Module 2: Token Estimator
export * from './token-estimator';

// Module 3: Service Aggregator
export * from './service-aggregator';

// Module 4: Generation Worker
export * from './generation-worker';

// Module 5: Token Limit Recovery
export * from './token-limit-recovery';

// Module 6: Prompt Dispatcher
export { PromptDispatcher, DEFAULT_CONFIG as DEFAULT_DISPATCHER_CONFIG, parseDispatchRequest } from './dispatcher';
export type {
  DispatchErrorEvent,
  DispatcherEvents,
  DispatchRequest,
  PromptDispatcherConfig,
  PromptDispatcherConfigInput,
  PromptDispatcherDependencies,
} from './dispatcher';

// Configuration
export * from './config';

// Version
export const VERSION = '1.0.0';
