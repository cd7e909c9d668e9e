/**
 * Type-safe event emitter keyed by an event map
 */

export type EventHandler<T = unknown> = (data: T) => void;

type ListenerMap<TEvents> = {
  [K in keyof TEvents]?: Set<EventHandler<TEvents[K]>>;
};

export class TypedEventEmitter<TEvents extends Record<string, unknown>> {
  private listeners: ListenerMap<TEvents> = {};

  on<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void {
    const handlers = this.listeners[event] ?? new Set<EventHandler<TEvents[K]>>();
    handlers.add(handler);
    this.listeners[event] = handlers;
  }

  off<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void {
    const handlers = this.listeners[event];
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        delete this.listeners[event];
      }
    }
  }

  /**
   * Register a handler that removes itself after the first call
   */
  once<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void {
    const onceHandler: EventHandler<TEvents[K]> = (data) => {
      this.off(event, onceHandler);
      handler(data);
    };
    this.on(event, onceHandler);
  }

  emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void {
    const handlers = this.listeners[event];
    if (!handlers) return;
    // Copy so handlers can unsubscribe while we iterate
    for (const handler of Array.from(handlers)) {
      handler(data);
    }
  }

  removeAllListeners(event?: keyof TEvents): void {
    if (event !== undefined) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }

  listenerCount(event: keyof TEvents): number {
    return this.listeners[event]?.size ?? 0;
  }
}
