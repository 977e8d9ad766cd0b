/**
 * Prompt Dispatcher - Public API
 */

export { PromptDispatcher, DEFAULT_CONFIG } from './PromptDispatcher';
export { dispatchRequestSchema, parseDispatchRequest } from './schema';
export type { ParsedDispatchRequest } from './schema';
export type {
  DispatchErrorEvent,
  DispatcherEvents,
  DispatchRequest,
  PromptDispatcherConfig,
  PromptDispatcherConfigInput,
  PromptDispatcherDependencies,
} from './types';
