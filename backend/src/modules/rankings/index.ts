/**
 * Rankings Module Index
 * =====================
 */

export * from './rankings.types.js';
export * from './universe.catalog.js';
export * from './snapshot.store.js';
export * from './inflight.registry.js';
export * from './refresh.scheduler.js';
export * from './rankings.service.js';
export * from './rankings.routes.js';
