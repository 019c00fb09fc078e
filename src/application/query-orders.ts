import type { Logger } from 'pino';
import { ORDER_ENTITY_TYPE, summarizeOrder } from '../domain/index.js';
import type { Event, OrderSnapshot, OrderSummary } from '../domain/index.js';
import type { EventLog } from './event-log.js';
import { projectOrder } from './order-projection.js';

/**
 * Use case: rebuild one order from its history.
 * Unrecognized event types are skipped and logged.
 */
export async function loadOrder(eventLog: EventLog, orderId: string, log: Logger): Promise<OrderSnapshot> {
  const events = await eventLog.load(ORDER_ENTITY_TYPE, orderId);
  return projectOrder(orderId, events, {
    onUnrecognized: (event) => {
      log.warn(
        { entity_id: event.entity_id, version: event.version, event_type: event.event_type },
        'Skipping unrecognized order event',
      );
    },
  });
}

/**
 * Use case: fetch one order's summary.
 * Returns null if the order has no events.
 */
export async function getOrder(eventLog: EventLog, orderId: string, log: Logger): Promise<OrderSummary | null> {
  const order = await loadOrder(eventLog, orderId, log);
  return order.version === 0 ? null : summarizeOrder(order);
}

/** Use case: the raw event history of one order, oldest first. */
export async function getOrderHistory(eventLog: EventLog, orderId: string): Promise<Event[]> {
  return eventLog.load(ORDER_ENTITY_TYPE, orderId);
}

/** Use case: every known order, sorted by id, each projected to a summary. */
export async function listOrders(eventLog: EventLog, log: Logger): Promise<OrderSummary[]> {
  const ids = await eventLog.listEntityIds(ORDER_ENTITY_TYPE);
  const summaries: OrderSummary[] = [];
  for (const id of ids) {
    summaries.push(summarizeOrder(await loadOrder(eventLog, id, log)));
  }
  return summaries;
}
