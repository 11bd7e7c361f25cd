/**
 * Prices Module Index
 * ===================
 */

export * from './price.types.js';
export * from './price-series.js';
export * from './providers/index.js';
