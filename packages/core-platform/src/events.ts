export type EventMap = Record<string, unknown>;

export type EventHandler<Payload> = (payload: Payload) => void;

export type Unsubscribe = () => void;

type ListenerTable<Events extends EventMap> = {
  [EventKey in keyof Events]?: Set<EventHandler<Events[EventKey]>>;
};

export class EventBus<Events extends EventMap> {
  private readonly listeners: ListenerTable<Events> = {};

  emit<EventKey extends keyof Events>(event: EventKey, payload: Events[EventKey]) {
    const handlers = this.listeners[event];
    if (!handlers) return;
    // Snapshot so handlers may subscribe or unsubscribe while we dispatch.
    for (const handler of [...handlers]) {
      handler(payload);
    }
  }

  on<EventKey extends keyof Events>(event: EventKey, handler: EventHandler<Events[EventKey]>): Unsubscribe {
    const handlers = this.listeners[event] ?? new Set<EventHandler<Events[EventKey]>>();
    handlers.add(handler);
    this.listeners[event] = handlers;
    return () => this.off(event, handler);
  }

  off<EventKey extends keyof Events>(event: EventKey, handler: EventHandler<Events[EventKey]>) {
    this.listeners[event]?.delete(handler);
  }

  listenerCount(event: keyof Events): number {
    return this.listeners[event]?.size ?? 0;
  }
}
