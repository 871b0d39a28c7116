export type EventMap = Record<string, unknown[]>;

type Listener<Args extends unknown[]> = (...args: Args) => void;

type ListenerMap<Events extends EventMap> = {
  [K in keyof Events]?: Array<Listener<Events[K]>>;
};

/** Minimal typed event emitter; listeners run synchronously in order. */
export class EventEmitter<Events extends EventMap> {
  private listeners: ListenerMap<Events> = {};

  public on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): this {
    const list = this.listeners[event] ?? [];
    list.push(listener);
    this.listeners[event] = list;
    return this;
  }

  public off<K extends keyof Events>(event: K, listener: Listener<Events[K]>): this {
    const list = this.listeners[event];
    if (!list) return this;
    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
    return this;
  }

  public once<K extends keyof Events>(event: K, listener: Listener<Events[K]>): this {
    const onceWrapper = (...args: Events[K]) => {
      this.off(event, onceWrapper);
      listener(...args);
    };
    return this.on(event, onceWrapper);
  }

  public emit<K extends keyof Events>(event: K, ...args: Events[K]): boolean {
    const list = this.listeners[event];
    if (!list || list.length === 0) return false;
    for (const listener of [...list]) {
      listener(...args);
    }
    return true;
  }

  public listenerCount(event: keyof Events): number {
    return this.listeners[event]?.length ?? 0;
  }
}
