import { describe, it, expect, vi } from 'vitest';
import { StoreQueryError, type ClickHouseConfig } from '@candlefold/utils';
import { ClickHouseBarStore } from '../../src/stores/clickhouse-bar-store.js';

const config: ClickHouseConfig = {
  url: 'http://localhost:8123',
  user: 'default',
  password: '',
  database: 'fx',
  barsTable: 'bars_1m',
  requestTimeoutMs: 1000,
};

function createMockClient(rows: unknown) {
  return {
    query: vi.fn().mockResolvedValue({ json: vi.fn().mockResolvedValue(rows) }),
    exec: vi.fn().mockResolvedValue({}),
    close: vi.fn().mockResolvedValue(undefined),
  };
}

describe('ClickHouseBarStore', () => {
  it('queries the range with bound parameters', async () => {
    const client = createMockClient([]);
    const store = new ClickHouseBarStore({ client, config });

    await store.query('EURUSD', 0, 180);

    expect(client.query).toHaveBeenCalledTimes(1);
    expect(client.query).toHaveBeenCalledWith(
      expect.objectContaining({
        query: expect.stringContaining('FROM fx.bars_1m FINAL'),
        query_params: { symbol: 'EURUSD', start: 0, end: 180 },
        format: 'JSONEachRow',
      })
    );
  });

  it('maps rows to 1-minute bars, coercing string numbers', async () => {
    const client = createMockClient([
      { ts: '60', open: '1.1', high: '1.2', low: '1.0', close: '1.15', volume: '7' },
      { ts: 120, open: 1.15, high: 1.25, low: 1.1, close: 1.2, volume: 3 },
    ]);
    const store = new ClickHouseBarStore({ client, config });

    const bars = await store.query('EURUSD', 0, 180);

    expect(bars).toEqual([
      { symbol: 'EURUSD', timeframe: 60, periodStart: 60, open: 1.1, high: 1.2, low: 1.0, close: 1.15, volume: 7 },
      { symbol: 'EURUSD', timeframe: 60, periodStart: 120, open: 1.15, high: 1.25, low: 1.1, close: 1.2, volume: 3 },
    ]);
  });

  it('keeps the last row of a duplicated minute', async () => {
    const client = createMockClient([
      { ts: 60, open: 1, high: 1, low: 1, close: 1, volume: 1 },
      { ts: 60, open: 2, high: 2, low: 2, close: 2, volume: 2 },
    ]);
    const store = new ClickHouseBarStore({ client, config });

    const bars = await store.query('EURUSD', 0, 180);

    expect(bars).toHaveLength(1);
    expect(bars[0].close).toBe(2);
  });

  it('wraps client failures in StoreQueryError', async () => {
    const client = createMockClient([]);
    client.query.mockRejectedValue(new Error('socket hang up'));
    const store = new ClickHouseBarStore({ client, config });

    const failure = store.query('EURUSD', 0, 180);

    await expect(failure).rejects.toThrow(StoreQueryError);
    await expect(failure).rejects.toThrow('ClickHouse query failed: socket hang up');
  });

  it('rejects rows of the wrong shape', async () => {
    const client = createMockClient([{ ts: 'not-a-time' }]);
    const store = new ClickHouseBarStore({ client, config });

    await expect(store.query('EURUSD', 0, 180)).rejects.toThrow(
      'ClickHouse returned rows of an unexpected shape'
    );
  });

  it('creates the bars table', async () => {
    const client = createMockClient([]);
    const store = new ClickHouseBarStore({ client, config });

    await store.ensureSchema();

    expect(client.exec).toHaveBeenCalledWith(
      expect.objectContaining({ query: expect.stringContaining('CREATE TABLE IF NOT EXISTS fx.bars_1m') })
    );
  });

  it('closes the client', async () => {
    const client = createMockClient([]);
    const store = new ClickHouseBarStore({ client, config });

    await store.close();

    expect(client.close).toHaveBeenCalledTimes(1);
  });
});
