/**
 * EventBus - typed, synchronous notifications
 *
 * Each event name maps to exactly one payload type. Handlers run in
 * subscription order on the emitting call stack; a throwing handler is
 * reported to the error handler and does not stop the others.
 */

import { toError } from '../errors';
import { createLogger, type Logger } from '../logger';
import type { ErrorHandler, EventHandler, ListenerMap, UnsubscribeFn } from './types';

export class EventBus<Events extends object> {
  private listeners: ListenerMap<Events> = {};
  private errorHandler?: ErrorHandler;
  private logger: Logger;

  constructor(logger: Logger = createLogger('events')) {
    this.logger = logger;
  }

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof Events & string>(event: K, handler: EventHandler<Events[K]>): UnsubscribeFn {
    return this.subscribe(event, handler, false);
  }

  /**
   * Subscribe to the next occurrence only
   */
  once<K extends keyof Events & string>(event: K, handler: EventHandler<Events[K]>): UnsubscribeFn {
    return this.subscribe(event, handler, true);
  }

  off<K extends keyof Events & string>(event: K, handler: EventHandler<Events[K]>): void {
    const entries = this.listeners[event];
    if (!entries) {
      return;
    }

    const index = entries.findIndex(entry => entry.handler === handler);
    if (index !== -1) {
      entries.splice(index, 1);
    }
    if (entries.length === 0) {
      delete this.listeners[event];
    }
  }

  /**
   * Deliver a payload to every current subscriber
   */
  emit<K extends keyof Events & string>(event: K, payload: Events[K]): void {
    const entries = this.listeners[event];
    if (!entries) {
      return;
    }

    // Snapshot: handlers may subscribe or unsubscribe while we iterate
    for (const entry of [...entries]) {
      if (entry.once) {
        this.off(event, entry.handler);
      }
      try {
        entry.handler(payload);
      } catch (error) {
        this.handleError(toError(error), event);
      }
    }
  }

  onError(handler: ErrorHandler): void {
    this.errorHandler = handler;
  }

  listenerCount<K extends keyof Events & string>(event: K): number {
    return this.listeners[event]?.length ?? 0;
  }

  removeAllListeners(): void {
    this.listeners = {};
  }

  private subscribe<K extends keyof Events & string>(
    event: K,
    handler: EventHandler<Events[K]>,
    once: boolean
  ): UnsubscribeFn {
    const entries = this.listeners[event] ?? [];
    entries.push({ handler, once });
    this.listeners[event] = entries;

    return () => this.off(event, handler);
  }

  private handleError(error: Error, event: string): void {
    if (!this.errorHandler) {
      this.logger.error(`Error in event handler for "${event}":`, error);
      return;
    }

    try {
      this.errorHandler(error, event);
    } catch (handlerError) {
      this.logger.error('Error in error handler:', handlerError);
      this.logger.error('Original error:', error);
    }
  }
}
