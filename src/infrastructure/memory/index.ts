export { InMemoryEventStore } from './in-memory-event-store.js';
export { default as memoryPlugin } from './memory-plugin.js';
export type { MemoryPluginOptions } from './memory-plugin.js';
