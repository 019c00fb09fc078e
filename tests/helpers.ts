import { randomUUID } from 'node:crypto';
import pino from 'pino';
import type { Logger } from 'pino';
import type { Event } from '../src/domain/index.js';
import { EventLog } from '../src/application/index.js';
import type { EventLogOptions } from '../src/application/index.js';
import { InMemoryEventStore } from '../src/infrastructure/memory/index.js';

/** Fixed creation time so envelopes compare deterministically. */
export const FIXED_NOW_ISO = '2026-02-18T12:00:00.000Z';

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Factory for creating test events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<Event> = {}): Event {
  return {
    event_id: overrides.event_id ?? randomUUID(),
    entity_type: overrides.entity_type ?? 'Order',
    entity_id: overrides.entity_id ?? 'order-1',
    event_type: overrides.event_type ?? 'OrderCreated',
    version: overrides.version ?? 1,
    payload: overrides.payload ?? { customer_id: 'customer-1' },
    occurred_at: overrides.occurred_at ?? FIXED_NOW_ISO,
  };
}

/** An event log over a fresh in-memory store. */
export function createMemoryEventLog(options: Partial<EventLogOptions> = {}) {
  const store = new InMemoryEventStore();
  const log = silentLogger();
  const eventLog = new EventLog(store, log, options);
  return { store, log, eventLog };
}
