export {
  ORDER_ENTITY_TYPE,
  ORDER_EVENT_TYPES,
  buildOrderEvent,
  orderCreated,
  itemAdded,
  itemRemoved,
  orderPaid,
  orderCancelled,
} from './events.js';
export type {
  OrderEvent,
  OrderEventType,
  OrderEventDraft,
  OrderCreated,
  ItemAdded,
  ItemRemoved,
  OrderPaid,
  OrderCancelled,
  OrderCreatedPayload,
  ItemAddedPayload,
  ItemRemovedPayload,
  OrderPaidPayload,
  OrderCancelledPayload,
} from './events.js';
export {
  emptyOrder,
  applyOrderEvent,
  orderProjection,
  orderTotal,
  itemCount,
  hasItem,
  getItem,
  isCreated,
  isPaid,
  isCancelled,
  summarizeOrder,
} from './order.js';
export type { OrderSnapshot, OrderSummary, OrderLine, OrderStatus } from './order.js';
