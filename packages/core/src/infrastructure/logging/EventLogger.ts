import type { EventBus, Unsubscribe } from '../../application/EventBus.js';
import type { DomainEvent } from '../../domain/events/DomainEvents.js';

/** Minimal logger surface; `console` satisfies it. */
export interface EventLogSink {
  info(message: string): void;
  error(message: string): void;
}

const FAILURE_EVENTS: ReadonlySet<DomainEvent['type']> = new Set([
  'file:failed',
  'event:rejected',
  'run:failed',
  'enrichment:mismatch',
]);

/** Render an event as `[type] key=value ...`, skipping the timestamp. Nested objects are flattened with dots. */
export function formatEvent(event: DomainEvent): string {
  const parts: string[] = [];
  const append = (prefix: string, value: unknown): void => {
    if (value !== null && typeof value === 'object') {
      for (const [k, v] of Object.entries(value)) append(`${prefix}.${k}`, v);
      return;
    }
    parts.push(`${prefix}=${String(value)}`);
  };

  for (const [key, value] of Object.entries(event)) {
    if (key === 'type' || key === 'timestamp') continue;
    append(key, value);
  }

  return parts.length > 0 ? `[${event.type}] ${parts.join(' ')}` : `[${event.type}]`;
}

/**
 * Subscribe a logger to every domain event on `bus`.
 *
 * Failure events go to `logger.error`, everything else to `logger.info`.
 * Returns a function that detaches the logger.
 */
export function attachEventLogger(bus: EventBus, logger: EventLogSink = console): Unsubscribe {
  return bus.onAny((event) => {
    const line = formatEvent(event);
    if (FAILURE_EVENTS.has(event.type)) {
      logger.error(line);
    } else {
      logger.info(line);
    }
  });
}
