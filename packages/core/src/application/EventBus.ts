import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

export type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

export type WildcardHandler = (event: DomainEvent) => void;

/** Detaches the handler it was returned for. Calling it twice is harmless. */
export type Unsubscribe = () => void;

export interface EventBusOptions {
  /** Receives errors thrown by handlers. Default: errors are dropped. */
  readonly onHandlerError?: (error: unknown, event: DomainEvent) => void;
}

type Delivery = (event: DomainEvent) => void;

const ANY = '*';

export function isEventOf<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}

/**
 * Typed publish/subscribe channel for domain events.
 *
 * Handlers run synchronously in subscription order, typed handlers before
 * wildcard ones. A throwing handler never reaches the emitter or the handlers
 * after it.
 */
export class EventBus {
  /** Keyed by event type or `*`, then by the handler as registered. */
  private readonly subscriptions = new Map<EventType | typeof ANY, Map<object, Delivery>>();

  constructor(private readonly options: EventBusOptions = {}) {}

  on<T extends EventType>(type: T, handler: EventHandler<T>): Unsubscribe {
    return this.subscribe(type, handler, (event) => {
      if (isEventOf(event, type)) handler(event);
    });
  }

  onAny(handler: WildcardHandler): Unsubscribe {
    return this.subscribe(ANY, handler, handler);
  }

  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.subscriptions.get(type)?.delete(handler);
  }

  offAny(handler: WildcardHandler): void {
    this.subscriptions.get(ANY)?.delete(handler);
  }

  emit(event: DomainEvent): void {
    const deliveries = [
      ...(this.subscriptions.get(event.type)?.values() ?? []),
      ...(this.subscriptions.get(ANY)?.values() ?? []),
    ];
    for (const deliver of deliveries) {
      try {
        deliver(event);
      } catch (error) {
        this.options.onHandlerError?.(error, event);
      }
    }
  }

  private subscribe(key: EventType | typeof ANY, handler: object, deliver: Delivery): Unsubscribe {
    const group = this.subscriptions.get(key) ?? new Map<object, Delivery>();
    this.subscriptions.set(key, group);
    group.set(handler, deliver);
    return () => {
      if (group.get(handler) === deliver) group.delete(handler);
    };
  }
}
