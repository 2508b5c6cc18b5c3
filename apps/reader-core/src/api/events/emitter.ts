/**
 * Typed Event Emitter
 * @module api/events/emitter
 */

import type { Disposable } from '../disposable';
import { createDisposable } from '../disposable';
import { createLogger } from '../../helpers/logger';

type EventHandler<T> = (data: T) => void;

type HandlerTable<TEvents> = { [K in keyof TEvents]?: Set<EventHandler<TEvents[K]>> };

const logger = createLogger('Events');

/**
 * Event emitter keyed by an event map. A throwing handler is logged and
 * does not stop delivery to the remaining handlers.
 */
export class TypedEventEmitter<TEvents extends object> {
  private handlers: HandlerTable<TEvents> = {};
  private onceHandlers: HandlerTable<TEvents> = {};

  /**
   * Subscribe to an event
   * @returns Disposable to unsubscribe
   */
  on<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): Disposable {
    let eventHandlers = this.handlers[event];
    if (!eventHandlers) {
      eventHandlers = new Set<EventHandler<TEvents[K]>>();
      this.handlers[event] = eventHandlers;
    }
    eventHandlers.add(handler);

    return createDisposable(() => {
      this.off(event, handler);
    });
  }

  off<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void {
    const eventHandlers = this.handlers[event];
    if (eventHandlers) {
      eventHandlers.delete(handler);
      if (eventHandlers.size === 0) {
        delete this.handlers[event];
      }
    }
  }

  /**
   * Subscribe to the next occurrence of an event only
   */
  once<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): Disposable {
    let onceEventHandlers = this.onceHandlers[event];
    if (!onceEventHandlers) {
      onceEventHandlers = new Set<EventHandler<TEvents[K]>>();
      this.onceHandlers[event] = onceEventHandlers;
    }
    onceEventHandlers.add(handler);

    return createDisposable(() => {
      this.onceHandlers[event]?.delete(handler);
    });
  }

  emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void {
    const eventHandlers = this.handlers[event];
    if (eventHandlers) {
      for (const handler of [...eventHandlers]) {
        this.invoke(event, handler, data);
      }
    }

    const onceEventHandlers = this.onceHandlers[event];
    if (onceEventHandlers) {
      delete this.onceHandlers[event];
      for (const handler of onceEventHandlers) {
        this.invoke(event, handler, data);
      }
    }
  }

  listenerCount<K extends keyof TEvents>(event: K): number {
    return (this.handlers[event]?.size ?? 0) + (this.onceHandlers[event]?.size ?? 0);
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

  dispose(): void {
    this.removeAllListeners();
  }

  private invoke<K extends keyof TEvents>(
    event: K,
    handler: EventHandler<TEvents[K]>,
    data: TEvents[K]
  ): void {
    try {
      handler(data);
    } catch (error) {
      logger.error(`Error in event handler for '${String(event)}':`, error);
    }
  }
}
