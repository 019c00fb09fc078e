export { EventLog, DEFAULT_EVENT_LOG_OPTIONS, encodePayload, decodeRecord } from './event-log.js';
export type { EventLogOptions } from './event-log.js';
export type { EventStore, EventRecord, InsertOptions, InsertOutcome } from './event-store.js';
export {
  MAX_VERSION,
  isStorableText,
  jsonValueSchema,
  eventPayloadSchema,
  eventEnvelopeSchema,
  orderEventRequestSchema,
  formatIssues,
} from './event-schema.js';
export type { OrderEventRequest } from './event-schema.js';
export { decodeOrderEvent, projectOrder } from './order-projection.js';
export {
  recordOrderEvent,
  createOrder,
  addItem,
  removeItem,
  payOrder,
  cancelOrder,
  DEFAULT_MAX_ATTEMPTS,
} from './order-commands.js';
export type { RecordOptions } from './order-commands.js';
export { loadOrder, getOrder, getOrderHistory, listOrders } from './query-orders.js';
