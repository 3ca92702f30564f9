/**
 * @candlefold/core - Domain types, time handling, ports and run schema
 */

export * from './types.js';
export * from './time/timeframe.js';
export * from './ports/index.js';
export * from './schemas/run-config.js';
