/**
 * Tournament Module Index
 * =======================
 */

export * from './tournament.types.js';
export * from './moving-average.js';
export * from './ratio.engine.js';
export * from './tournament.runner.js';
export * from './rank.builder.js';
export * from './tournament.summary.js';
