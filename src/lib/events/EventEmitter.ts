/**
 * Maps event names to the argument tuple their handlers receive.
 */
export type EventMap<Events> = { [K in keyof Events]: unknown[] };

export type EventHandler<Args extends unknown[] = unknown[]> = (...args: Args) => void;

type HandlerTable<Events extends EventMap<Events>> = {
  [K in keyof Events]?: Set<EventHandler<Events[K]>>;
};

/**
 * Minimal synchronous event emitter.
 * Handlers are stored in a Set, so registering the same handler twice has no effect.
 */
export class EventEmitter<Events extends EventMap<Events> = Record<string, unknown[]>> {
  private handlers: HandlerTable<Events> = {};

  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    let set: Set<EventHandler<Events[K]>> | undefined = this.handlers[event];
    if (!set) {
      set = new Set<EventHandler<Events[K]>>();
      this.handlers[event] = set;
    }
    set.add(handler);
  }

  off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    const set: Set<EventHandler<Events[K]>> | undefined = this.handlers[event];
    if (!set) return;

    set.delete(handler);
    if (set.size === 0) {
      delete this.handlers[event];
    }
  }

  once<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    const wrapper: EventHandler<Events[K]> = (...args) => {
      this.off(event, wrapper);
      handler(...args);
    };
    this.on(event, wrapper);
  }

  /**
   * Call every handler registered for an event.
   * A handler that throws is logged and does not stop the others.
   */
  emit<K extends keyof Events>(event: K, ...args: Events[K]): void {
    const set: Set<EventHandler<Events[K]>> | undefined = this.handlers[event];
    if (!set) return;

    for (const handler of Array.from(set)) {
      try {
        handler(...args);
      } catch (error) {
        console.error(`[EventEmitter] Error in handler for "${String(event)}":`, error);
      }
    }
  }

  removeAllListeners(event?: keyof Events): void {
    if (event === undefined) {
      this.handlers = {};
      return;
    }
    delete this.handlers[event];
  }

  listenerCount(event: keyof Events): number {
    return this.handlers[event]?.size ?? 0;
  }
}
