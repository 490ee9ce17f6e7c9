/**
 * Default event map: event names to listener argument tuples.
 */
export type DefaultEventMap = Record<string, unknown[]>;

/**
 * Event callback function type.
 */
export type EventCallback<Args extends unknown[] = unknown[]> = (...args: Args) => void;

/**
 * Handle returned by {@link EventEmitter.subscribe}. Calling `unsubscribe` removes the
 * listener; further calls are no-ops.
 */
export interface Subscription {
  readonly active: boolean;
  unsubscribe(): void;
}

type ListenerTable<EventMap extends DefaultEventMap> = {
  [K in keyof EventMap]?: Array<EventCallback<EventMap[K]>>;
};

/**
 * EventEmitter class is used to emit and subscribe to events.
 * @template EventMap - Map of event names to their argument types
 */
export class EventEmitter<EventMap extends DefaultEventMap = DefaultEventMap> {
  #events: ListenerTable<EventMap> = {};

  /**
   * Subscribe to the event.
   * @param name Event name.
   * @param fn Callback.
   */
  on<K extends keyof EventMap>(name: K, fn: EventCallback<EventMap[K]>): void {
    const callbacks = this.#events[name];
    if (callbacks) callbacks.push(fn);
    else this.#events[name] = [fn];
  }

  /**
   * Subscribe to the event and receive a handle that owns the registration.
   * Dropping the handle does nothing; the listener stays until `unsubscribe` runs.
   * @param name Event name.
   * @param fn Callback.
   */
  subscribe<K extends keyof EventMap>(name: K, fn: EventCallback<EventMap[K]>): Subscription {
    let active = true;
    this.on(name, fn);
    return {
      get active() {
        return active;
      },
      unsubscribe: () => {
        if (!active) return;
        active = false;
        this.off(name, fn);
      },
    };
  }

  /**
   * Emit event.
   * @param name Event name.
   * @param args Arguments to pass to each listener.
   */
  emit<K extends keyof EventMap>(name: K, ...args: EventMap[K]): void {
    const callbacks = this.#events[name];
    if (!callbacks) return;
    // `off` replaces the array, so listeners removed mid-emit still see this snapshot.
    for (const fn of callbacks) {
      fn(...args);
    }
  }

  /**
   * Remove a specific callback from event
   * or all event subscriptions.
   * @param name Event name.
   * @param fn Callback.
   */
  off<K extends keyof EventMap>(name: K, fn?: EventCallback<EventMap[K]>): void {
    const callbacks = this.#events[name];
    if (!callbacks) return;
    if (fn) {
      this.#events[name] = callbacks.filter((cb) => cb !== fn);
    } else {
      delete this.#events[name];
    }
  }

  /**
   * Subscribe to an event that will be called only once.
   * @param name Event name.
   * @param fn Callback.
   */
  once<K extends keyof EventMap>(name: K, fn: EventCallback<EventMap[K]>): void {
    const wrapper = (...args: EventMap[K]) => {
      this.off(name, wrapper);
      fn(...args);
    };
    this.on(name, wrapper);
  }

  /**
   * Number of listeners currently registered for an event.
   */
  listenerCount<K extends keyof EventMap>(name: K): number {
    return this.#events[name]?.length ?? 0;
  }

  /**
   * Remove all registered events and subscriptions.
   */
  removeAllListeners(): void {
    this.#events = {};
  }
}
