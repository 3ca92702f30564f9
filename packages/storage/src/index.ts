/**
 * @candlefold/storage - Bar store adapters
 *
 * Implementations of BarStorePort over ClickHouse, Prometheus, histdata CSV
 * files and memory, plus a retrying decorator.
 */

export { logger } from './logger.js';
export * from './stores/in-memory-bar-store.js';
export * from './stores/clickhouse-bar-store.js';
export * from './stores/prometheus-bar-store.js';
export * from './stores/retrying-bar-store.js';
export * from './histdata/histdata-csv.js';
