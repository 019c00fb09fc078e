import type { Logger } from 'pino';
import { ConflictError, ORDER_ENTITY_TYPE, buildOrderEvent } from '../domain/index.js';
import type { OrderEvent, OrderEventDraft } from '../domain/index.js';
import type { EventLog } from './event-log.js';

export const DEFAULT_MAX_ATTEMPTS = 3;

export interface RecordOptions {
  /**
   * Version the caller last observed. When set, the event is appended at
   * expectedVersion + 1 exactly once and a conflict is returned as-is.
   */
  expectedVersion?: number;
  /** Attempts when the version is read from the log. Defaults to 3. */
  maxAttempts?: number;
}

/**
 * Records one Order event at the next version.
 *
 * Reads the latest version, builds the event at latest + 1 and appends it.
 * The read is only a hint, so a ConflictError triggers a fresh read and a
 * new event (new event_id) until `maxAttempts` is spent. Storage and
 * serialization failures are never retried.
 */
export async function recordOrderEvent(
  eventLog: EventLog,
  orderId: string,
  draft: OrderEventDraft,
  log: Logger,
  options: RecordOptions = {},
): Promise<OrderEvent> {
  if (options.expectedVersion !== undefined) {
    const event = buildOrderEvent(orderId, draft, options.expectedVersion + 1);
    await eventLog.append(event);
    return event;
  }

  const maxAttempts = Math.max(options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS, 1);

  for (let attempt = 1; ; attempt++) {
    const latest = await eventLog.latestVersion(ORDER_ENTITY_TYPE, orderId);
    const event = buildOrderEvent(orderId, draft, latest + 1);

    try {
      await eventLog.append(event);
      return event;
    } catch (err: unknown) {
      if (!(err instanceof ConflictError) || attempt >= maxAttempts) throw err;
      log.info(
        { entity_id: orderId, version: event.version, attempt, reason: err.reason },
        'Order append conflicted, re-reading latest version',
      );
    }
  }
}

export function createOrder(eventLog: EventLog, orderId: string, customerId: string, log: Logger, options?: RecordOptions) {
  return recordOrderEvent(eventLog, orderId, { event_type: 'OrderCreated', payload: { customer_id: customerId } }, log, options);
}

export function addItem(
  eventLog: EventLog,
  orderId: string,
  item: { item_id: string; quantity: number; price: number },
  log: Logger,
  options?: RecordOptions,
) {
  return recordOrderEvent(eventLog, orderId, { event_type: 'ItemAdded', payload: item }, log, options);
}

export function removeItem(eventLog: EventLog, orderId: string, itemId: string, log: Logger, options?: RecordOptions) {
  return recordOrderEvent(eventLog, orderId, { event_type: 'ItemRemoved', payload: { item_id: itemId } }, log, options);
}

export function payOrder(eventLog: EventLog, orderId: string, paymentMethod: string, log: Logger, options?: RecordOptions) {
  return recordOrderEvent(eventLog, orderId, { event_type: 'OrderPaid', payload: { payment_method: paymentMethod } }, log, options);
}

export function cancelOrder(eventLog: EventLog, orderId: string, reason: string, log: Logger, options?: RecordOptions) {
  return recordOrderEvent(eventLog, orderId, { event_type: 'OrderCancelled', payload: { reason } }, log, options);
}
