import { createEvent } from '../event.js';
import type { Event } from '../event.js';

/** Entity type under which every Order event is stored. */
export const ORDER_ENTITY_TYPE = 'Order';

export type OrderCreatedPayload = { customer_id: string };
export type ItemAddedPayload = { item_id: string; quantity: number; price: number };
export type ItemRemovedPayload = { item_id: string };
export type OrderPaidPayload = { payment_method: string };
export type OrderCancelledPayload = { reason: string };

export type OrderCreated = Event<'OrderCreated', OrderCreatedPayload>;
export type ItemAdded = Event<'ItemAdded', ItemAddedPayload>;
export type ItemRemoved = Event<'ItemRemoved', ItemRemovedPayload>;
export type OrderPaid = Event<'OrderPaid', OrderPaidPayload>;
export type OrderCancelled = Event<'OrderCancelled', OrderCancelledPayload>;

/** Closed set of event kinds the Order projection understands. */
export type OrderEvent = OrderCreated | ItemAdded | ItemRemoved | OrderPaid | OrderCancelled;

export type OrderEventType = OrderEvent['event_type'];

export const ORDER_EVENT_TYPES: readonly OrderEventType[] = [
  'OrderCreated',
  'ItemAdded',
  'ItemRemoved',
  'OrderPaid',
  'OrderCancelled',
];

/**
 * An Order event before a version is chosen.
 * Commands build one of these and let the caller decide the version.
 */
export type OrderEventDraft =
  | { readonly event_type: 'OrderCreated'; readonly payload: OrderCreatedPayload }
  | { readonly event_type: 'ItemAdded'; readonly payload: ItemAddedPayload }
  | { readonly event_type: 'ItemRemoved'; readonly payload: ItemRemovedPayload }
  | { readonly event_type: 'OrderPaid'; readonly payload: OrderPaidPayload }
  | { readonly event_type: 'OrderCancelled'; readonly payload: OrderCancelledPayload };

/** Stamps a draft with identity, version and timestamp. */
export function buildOrderEvent(orderId: string, draft: OrderEventDraft, version: number): OrderEvent {
  switch (draft.event_type) {
    case 'OrderCreated':
      return orderCreated(orderId, draft.payload.customer_id, version);
    case 'ItemAdded':
      return itemAdded(orderId, draft.payload.item_id, draft.payload.quantity, draft.payload.price, version);
    case 'ItemRemoved':
      return itemRemoved(orderId, draft.payload.item_id, version);
    case 'OrderPaid':
      return orderPaid(orderId, draft.payload.payment_method, version);
    case 'OrderCancelled':
      return orderCancelled(orderId, draft.payload.reason, version);
  }
}

// --------------------------------------------------
// Factories
// --------------------------------------------------

export function orderCreated(orderId: string, customerId: string, version = 1): OrderCreated {
  return createEvent({
    entity_type: ORDER_ENTITY_TYPE,
    entity_id: orderId,
    event_type: 'OrderCreated',
    version,
    payload: { customer_id: customerId },
  });
}

export function itemAdded(
  orderId: string,
  itemId: string,
  quantity: number,
  price: number,
  version: number,
): ItemAdded {
  return createEvent({
    entity_type: ORDER_ENTITY_TYPE,
    entity_id: orderId,
    event_type: 'ItemAdded',
    version,
    payload: { item_id: itemId, quantity, price },
  });
}

export function itemRemoved(orderId: string, itemId: string, version: number): ItemRemoved {
  return createEvent({
    entity_type: ORDER_ENTITY_TYPE,
    entity_id: orderId,
    event_type: 'ItemRemoved',
    version,
    payload: { item_id: itemId },
  });
}

export function orderPaid(orderId: string, paymentMethod: string, version: number): OrderPaid {
  return createEvent({
    entity_type: ORDER_ENTITY_TYPE,
    entity_id: orderId,
    event_type: 'OrderPaid',
    version,
    payload: { payment_method: paymentMethod },
  });
}

export function orderCancelled(orderId: string, reason: string, version: number): OrderCancelled {
  return createEvent({
    entity_type: ORDER_ENTITY_TYPE,
    entity_id: orderId,
    event_type: 'OrderCancelled',
    version,
    payload: { reason },
  });
}
