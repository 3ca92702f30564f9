/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration objects for bar store connections and
 * retry behaviour.
 */

import { config as loadDotenv } from 'dotenv';
import { ConfigurationError } from '../errors.js';

loadDotenv();

export interface ClickHouseConfig {
  url: string;
  user: string;
  password: string;
  database: string;
  barsTable: string;
  requestTimeoutMs: number;
}

export interface PrometheusConfig {
  url: string;
  timeoutMs: number;
  /** Gauges are read as `<metricPrefix>_open` ... `<metricPrefix>_volume` */
  metricPrefix: string;
}

export interface StoreRetryConfig {
  maxRetries: number;
  initialDelayMs: number;
}

function parseIntegerEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got '${raw}'`, name);
  }
  return value;
}

/**
 * Load ClickHouse configuration from environment variables
 */
export function getClickHouseConfig(): ClickHouseConfig {
  const { CLICKHOUSE_HOST, CLICKHOUSE_USER, CLICKHOUSE_PASSWORD, CLICKHOUSE_DATABASE, CLICKHOUSE_BARS_TABLE } =
    process.env;

  // Prefer CLICKHOUSE_HTTP_PORT (explicit HTTP) over CLICKHOUSE_PORT (may be native TCP)
  const port = process.env.CLICKHOUSE_HTTP_PORT
    ? parseIntegerEnv('CLICKHOUSE_HTTP_PORT', 8123)
    : parseIntegerEnv('CLICKHOUSE_PORT', 8123);

  const barsTable = CLICKHOUSE_BARS_TABLE || 'ohlcv_1m';
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(barsTable)) {
    throw new ConfigurationError(`Invalid ClickHouse table name: ${barsTable}`, 'CLICKHOUSE_BARS_TABLE');
  }

  return {
    url: `http://${CLICKHOUSE_HOST || 'localhost'}:${port}`,
    user: CLICKHOUSE_USER || 'default',
    password: CLICKHOUSE_PASSWORD || '',
    database: CLICKHOUSE_DATABASE || 'candlefold',
    barsTable,
    requestTimeoutMs: parseIntegerEnv('CLICKHOUSE_REQUEST_TIMEOUT_MS', 60000),
  };
}

/**
 * Load Prometheus configuration from environment variables
 */
export function getPrometheusConfig(): PrometheusConfig {
  const metricPrefix = process.env.PROMETHEUS_METRIC_PREFIX || 'fx_ohlcv';
  if (!/^[A-Za-z_:][A-Za-z0-9_:]*$/.test(metricPrefix)) {
    throw new ConfigurationError(`Invalid Prometheus metric prefix: ${metricPrefix}`, 'PROMETHEUS_METRIC_PREFIX');
  }

  return {
    url: process.env.PROMETHEUS_URL || 'http://localhost:9090',
    timeoutMs: parseIntegerEnv('PROMETHEUS_TIMEOUT_MS', 30000),
    metricPrefix,
  };
}

/**
 * Bounded backoff applied at the bar store boundary
 */
export function getStoreRetryConfig(): StoreRetryConfig {
  return {
    maxRetries: parseIntegerEnv('STORE_MAX_RETRIES', 3),
    initialDelayMs: parseIntegerEnv('STORE_RETRY_DELAY_MS', 500),
  };
}

export * from './yaml-config.js';
