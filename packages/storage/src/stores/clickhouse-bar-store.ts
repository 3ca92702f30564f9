/**
 * ClickHouse bar store
 *
 * Reads 1-minute bars from a single MergeTree table:
 *   (symbol String, timestamp DateTime, open/high/low/close/volume Float64)
 * Times go over the wire as UNIX seconds.
 */

import { createClient, type ClickHouseClient } from '@clickhouse/client';
import { z } from 'zod';
import type { Bar, BarStorePort } from '@candlefold/core';
import { SOURCE_TIMEFRAME_SECONDS } from '@candlefold/core';
import { getClickHouseConfig, StoreQueryError, type ClickHouseConfig } from '@candlefold/utils';
import { logger } from '../logger.js';

export type ClickHouseBarClient = Pick<ClickHouseClient, 'query' | 'exec' | 'close'>;

const barRowSchema = z.object({
  ts: z.coerce.number().int(),
  open: z.coerce.number(),
  high: z.coerce.number(),
  low: z.coerce.number(),
  close: z.coerce.number(),
  volume: z.coerce.number(),
});

const barRowsSchema = z.array(barRowSchema);

export interface ClickHouseBarStoreOptions {
  client?: ClickHouseBarClient;
  config?: ClickHouseConfig;
}

export class ClickHouseBarStore implements BarStorePort {
  readonly name = 'clickhouse';
  private readonly client: ClickHouseBarClient;
  private readonly config: ClickHouseConfig;

  constructor(options: ClickHouseBarStoreOptions = {}) {
    this.config = options.config ?? getClickHouseConfig();
    this.client = options.client ?? createClickHouseBarClient(this.config);
  }

  private get qualifiedTable(): string {
    return `${this.config.database}.${this.config.barsTable}`;
  }

  /**
   * Create the bars table when it does not exist
   */
  async ensureSchema(): Promise<void> {
    await this.client.exec({
      query: `
        CREATE TABLE IF NOT EXISTS ${this.qualifiedTable} (
          symbol String,
          timestamp DateTime,
          open Float64,
          high Float64,
          low Float64,
          close Float64,
          volume Float64
        )
        ENGINE = ReplacingMergeTree()
        PARTITION BY toYYYYMM(timestamp)
        ORDER BY (symbol, timestamp)
      `,
    });
    logger.info('ClickHouse bars table ready', { table: this.qualifiedTable });
  }

  async query(symbol: string, start: number, end: number): Promise<Bar[]> {
    const context = { symbol, start, end, table: this.qualifiedTable };
    let rows: unknown;

    try {
      const result = await this.client.query({
        query: `
          SELECT
            toUnixTimestamp(timestamp) AS ts,
            open,
            high,
            low,
            close,
            volume
          FROM ${this.qualifiedTable} FINAL
          WHERE symbol = {symbol:String}
            AND timestamp >= toDateTime({start:UInt32})
            AND timestamp < toDateTime({end:UInt32})
          ORDER BY timestamp ASC
        `,
        query_params: { symbol, start, end },
        format: 'JSONEachRow',
        clickhouse_settings: {
          max_execution_time: 30,
        },
      });
      rows = await result.json();
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new StoreQueryError(`ClickHouse query failed: ${message}`, this.name, context);
    }

    const parsed = barRowsSchema.safeParse(rows);
    if (!parsed.success) {
      throw new StoreQueryError('ClickHouse returned rows of an unexpected shape', this.name, {
        ...context,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const bars: Bar[] = [];
    for (const row of parsed.data) {
      const previous = bars[bars.length - 1];
      const bar: Bar = {
        symbol,
        timeframe: SOURCE_TIMEFRAME_SECONDS,
        periodStart: row.ts,
        open: row.open,
        high: row.high,
        low: row.low,
        close: row.close,
        volume: row.volume,
      };
      if (previous && previous.periodStart === row.ts) {
        bars[bars.length - 1] = bar;
      } else {
        bars.push(bar);
      }
    }

    logger.debug('ClickHouse bars loaded', { ...context, count: bars.length });
    return bars;
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

export function createClickHouseBarClient(config: ClickHouseConfig): ClickHouseClient {
  return createClient({
    url: config.url,
    username: config.user,
    database: config.database,
    request_timeout: config.requestTimeoutMs,
    max_open_connections: 10,
    ...(config.password.trim() !== '' ? { password: config.password } : {}),
  });
}
