export { EventBus } from './EventBus';
export type { ErrorHandler, EventHandler, UnsubscribeFn } from './types';
