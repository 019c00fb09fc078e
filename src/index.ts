export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
export { buildApp } from './app.js';
export type { BuildAppOptions } from './app.js';
export { orderRoutes, healthRoutes } from './interfaces/http/index.js';
export type { OrderRoutesOptions } from './interfaces/http/index.js';
