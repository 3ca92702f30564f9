import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  getClickHouseConfig,
  getPrometheusConfig,
  getStoreRetryConfig,
  loadYamlFile,
} from '../../src/config/index.js';
import { ConfigurationError } from '../../src/errors.js';

describe('environment configuration', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('builds the ClickHouse URL from host and HTTP port', () => {
    vi.stubEnv('CLICKHOUSE_HOST', 'ch.internal');
    vi.stubEnv('CLICKHOUSE_HTTP_PORT', '18123');
    vi.stubEnv('CLICKHOUSE_USER', 'reader');
    vi.stubEnv('CLICKHOUSE_PASSWORD', 'test-secret');
    vi.stubEnv('CLICKHOUSE_DATABASE', 'market');
    vi.stubEnv('CLICKHOUSE_BARS_TABLE', 'fx_1m');

    expect(getClickHouseConfig()).toEqual({
      url: 'http://ch.internal:18123',
      user: 'reader',
      password: 'test-secret',
      database: 'market',
      barsTable: 'fx_1m',
      requestTimeoutMs: 60000,
    });
  });

  it('rejects table names that are not identifiers', () => {
    vi.stubEnv('CLICKHOUSE_BARS_TABLE', 'bars; DROP TABLE x');

    expect(() => getClickHouseConfig()).toThrow(ConfigurationError);
  });

  it('rejects non-integer numeric settings', () => {
    vi.stubEnv('STORE_MAX_RETRIES', 'three');

    expect(() => getStoreRetryConfig()).toThrow('STORE_MAX_RETRIES must be a non-negative integer');
  });

  it('reads retry settings', () => {
    vi.stubEnv('STORE_MAX_RETRIES', '5');
    vi.stubEnv('STORE_RETRY_DELAY_MS', '20');

    expect(getStoreRetryConfig()).toEqual({ maxRetries: 5, initialDelayMs: 20 });
  });

  it('defaults the Prometheus URL', () => {
    vi.stubEnv('PROMETHEUS_URL', '');
    vi.stubEnv('PROMETHEUS_TIMEOUT_MS', '');
    vi.stubEnv('PROMETHEUS_METRIC_PREFIX', '');

    expect(getPrometheusConfig()).toEqual({
      url: 'http://localhost:9090',
      timeoutMs: 30000,
      metricPrefix: 'fx_ohlcv',
    });
  });

  it('reads the Prometheus gauge prefix', () => {
    vi.stubEnv('PROMETHEUS_METRIC_PREFIX', 'fx_ohlc');

    expect(getPrometheusConfig().metricPrefix).toBe('fx_ohlc');
  });

  it('rejects a gauge prefix that is not a metric name', () => {
    vi.stubEnv('PROMETHEUS_METRIC_PREFIX', 'fx-ohlc{');

    expect(() => getPrometheusConfig()).toThrow(ConfigurationError);
  });
});

describe('loadYamlFile', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  function writeTemp(name: string, content: string): string {
    dir = mkdtempSync(join(tmpdir(), 'candlefold-yaml-'));
    const file = join(dir, name);
    writeFileSync(file, content);
    return file;
  }

  it('parses a YAML mapping', () => {
    const file = writeTemp('run.yaml', 'symbol: EURUSD\ntimeframes:\n  - 1m\n  - 15m\n');

    expect(loadYamlFile(file)).toEqual({ symbol: 'EURUSD', timeframes: ['1m', '15m'] });
  });

  it('keeps unquoted timestamps as strings', () => {
    const file = writeTemp('run.yaml', 'range:\n  start: 2024-01-01T00:00:00Z\n');

    expect(loadYamlFile(file)).toEqual({ range: { start: '2024-01-01T00:00:00Z' } });
  });

  it('fails on a missing file', () => {
    expect(() => loadYamlFile('/nonexistent/run.yaml')).toThrow('Config file not found: /nonexistent/run.yaml');
  });

  it('fails on invalid YAML', () => {
    const file = writeTemp('broken.yaml', 'symbol: [EURUSD\n');

    expect(() => loadYamlFile(file)).toThrow(ConfigurationError);
  });
});
