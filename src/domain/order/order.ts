import type { Projection } from '../projection.js';
import type { OrderEvent } from './events.js';
import { ORDER_ENTITY_TYPE } from './events.js';

export type OrderStatus = 'not_created' | 'created' | 'paid' | 'cancelled';

export interface OrderLine {
  readonly quantity: number;
  readonly price: number;
}

/**
 * Materialized Order state.
 *
 * Rebuilt from the event log on every read and never persisted here.
 * `items` keeps insertion order of first add.
 */
export interface OrderSnapshot {
  readonly order_id: string;
  readonly customer_id: string | null;
  readonly items: Readonly<Record<string, OrderLine>>;
  readonly status: OrderStatus;
  readonly version: number;
}

/** Snapshot plus the derived values callers usually display. */
export interface OrderSummary extends OrderSnapshot {
  readonly total: number;
  readonly item_count: number;
}

export function emptyOrder(orderId: string): OrderSnapshot {
  return {
    order_id: orderId,
    customer_id: null,
    items: {},
    status: 'not_created',
    version: 0,
  };
}

function withoutItem(
  items: Readonly<Record<string, OrderLine>>,
  itemId: string,
): Readonly<Record<string, OrderLine>> {
  if (!Object.hasOwn(items, itemId)) return items;
  return Object.fromEntries(Object.entries(items).filter(([id]) => id !== itemId));
}

/**
 * Order transition table. Each case is a pure function of (state, event).
 * The switch is exhaustive over OrderEvent; adding a kind without a case
 * fails the build.
 */
export function applyOrderEvent(state: OrderSnapshot, event: OrderEvent): OrderSnapshot {
  switch (event.event_type) {
    case 'OrderCreated':
      return { ...state, customer_id: event.payload.customer_id, status: 'created' };

    case 'ItemAdded':
      return {
        ...state,
        items: {
          ...state.items,
          [event.payload.item_id]: { quantity: event.payload.quantity, price: event.payload.price },
        },
      };

    case 'ItemRemoved':
      return { ...state, items: withoutItem(state.items, event.payload.item_id) };

    case 'OrderPaid':
      return { ...state, status: 'paid' };

    case 'OrderCancelled':
      return { ...state, status: 'cancelled' };
  }
}

export const orderProjection: Projection<OrderSnapshot, OrderEvent> = {
  entityType: ORDER_ENTITY_TYPE,
  initial: emptyOrder,
  apply: applyOrderEvent,
};

// --------------------------------------------------
// Derived reads
// --------------------------------------------------

/** Sum of quantity × price over all line items. */
export function orderTotal(order: OrderSnapshot): number {
  return Object.values(order.items).reduce((sum, line) => sum + line.quantity * line.price, 0);
}

/** Sum of quantities over all line items. */
export function itemCount(order: OrderSnapshot): number {
  return Object.values(order.items).reduce((sum, line) => sum + line.quantity, 0);
}

export function hasItem(order: OrderSnapshot, itemId: string): boolean {
  return Object.hasOwn(order.items, itemId);
}

export function getItem(order: OrderSnapshot, itemId: string): OrderLine | undefined {
  return hasItem(order, itemId) ? order.items[itemId] : undefined;
}

export function isCreated(order: OrderSnapshot): boolean {
  return order.status === 'created';
}

export function isPaid(order: OrderSnapshot): boolean {
  return order.status === 'paid';
}

export function isCancelled(order: OrderSnapshot): boolean {
  return order.status === 'cancelled';
}

export function summarizeOrder(order: OrderSnapshot): OrderSummary {
  return { ...order, total: orderTotal(order), item_count: itemCount(order) };
}
