/**
 * Type definitions for the Event Bus
 */

/**
 * Event handler function
 */
export type EventHandler<T> = (payload: T) => void;

/**
 * Unsubscribe function returned by on()
 */
export type UnsubscribeFn = () => void;

/**
 * Called when a handler throws; the remaining handlers still run
 */
export type ErrorHandler = (error: Error, event: string) => void;

/**
 * Internal listener entry
 */
export interface ListenerEntry<T> {
  handler: EventHandler<T>;
  once: boolean;
}

/**
 * Listener lists keyed by event name, one payload type per event
 */
export type ListenerMap<Events> = {
  [K in keyof Events]?: Array<ListenerEntry<Events[K]>>;
};
