/**
 * Type-safe event emitter.
 * Components extend this with their own event map.
 */

import { createModuleLogger } from './Logger.js';

const log = createModuleLogger('EventEmitter');

// ============================================================================
// Types
// ============================================================================

export type EventHandler<T> = (data: T) => void | Promise<void>;

type HandlerSets<TEvents> = {
  [K in keyof TEvents]?: Set<EventHandler<TEvents[K]>>;
};

// ============================================================================
// EventEmitter Class
// ============================================================================

/**
 * Generic type-safe event emitter.
 *
 * @typeParam TEvents - Map of event names to their data types
 */
export class EventEmitter<TEvents extends { [key: string]: unknown }> {
  private handlers: HandlerSets<TEvents> = {};
  private onceHandlers: HandlerSets<TEvents> = {};

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<K extends keyof TEvents>(
    event: K,
    handler: EventHandler<TEvents[K]>,
  ): () => void {
    const set = this.handlers[event] ?? new Set<EventHandler<TEvents[K]>>();
    set.add(handler);
    this.handlers[event] = set;

    return () => this.off(event, handler);
  }

  /**
   * Subscribe to an event for one-time execution.
   */
  once<K extends keyof TEvents>(
    event: K,
    handler: EventHandler<TEvents[K]>,
  ): () => void {
    const set = this.onceHandlers[event] ?? new Set<EventHandler<TEvents[K]>>();
    set.add(handler);
    this.onceHandlers[event] = set;

    return () => {
      this.onceHandlers[event]?.delete(handler);
    };
  }

  off<K extends keyof TEvents>(
    event: K,
    handler: EventHandler<TEvents[K]>,
  ): void {
    this.handlers[event]?.delete(handler);
    this.onceHandlers[event]?.delete(handler);
  }

  /**
   * Emit an event to all subscribers. Handler errors are logged, not thrown,
   * so one failing subscriber does not starve the others.
   */
  protected async emit<K extends keyof TEvents>(
    event: K,
    data: TEvents[K],
  ): Promise<void> {
    const allHandlers: Array<EventHandler<TEvents[K]>> = [
      ...(this.handlers[event] ?? []),
      ...(this.onceHandlers[event] ?? []),
    ];
    delete this.onceHandlers[event];

    await Promise.all(
      allHandlers.map(async (handler) => {
        try {
          await handler(data);
        } catch (error) {
          log.error('handler:failed', {
            event: String(event),
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }),
    );
  }

  /**
   * Emit without awaiting handlers.
   */
  protected emitSync<K extends keyof TEvents>(
    event: K,
    data: TEvents[K],
  ): void {
    void this.emit(event, data);
  }

  removeAllListeners<K extends keyof TEvents>(event?: K): void {
    if (event !== undefined) {
      delete this.handlers[event];
      delete this.onceHandlers[event];
    } else {
      this.handlers = {};
      this.onceHandlers = {};
    }
  }

  listenerCount<K extends keyof TEvents>(event: K): number {
    const regular = this.handlers[event]?.size ?? 0;
    const once = this.onceHandlers[event]?.size ?? 0;
    return regular + once;
  }
}
