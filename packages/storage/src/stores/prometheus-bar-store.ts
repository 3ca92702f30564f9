/**
 * Prometheus bar store
 *
 * Reads bars pushed as one gauge per OHLCV component:
 *   <prefix>_open{currency_pair="EURUSD", timeframe="1m"} ... <prefix>_volume{...}
 *
 * Raw samples are pulled with a range selector so that minutes without a push
 * stay missing instead of being filled from the lookback window. A sample
 * belongs to the minute its timestamp falls in, unless the series carries a
 * `timestamp` label (yyyyMMddHHmmss, UTC), which then names the minute.
 * The volume gauge is optional; bars without it get volume 0.
 */

import axios, { type AxiosInstance } from 'axios';
import { DateTime } from 'luxon';
import { z } from 'zod';
import type { Bar, BarStorePort } from '@candlefold/core';
import { alignToTimeframe, SOURCE_TIMEFRAME_SECONDS } from '@candlefold/core';
import { getPrometheusConfig, StoreQueryError, type PrometheusConfig } from '@candlefold/utils';
import { logger } from '../logger.js';

export const OHLCV_FIELDS = ['open', 'high', 'low', 'close', 'volume'] as const;
export type OhlcvField = (typeof OHLCV_FIELDS)[number];

const matrixResponseSchema = z.object({
  status: z.literal('success'),
  data: z.object({
    resultType: z.literal('matrix'),
    result: z.array(
      z.object({
        metric: z.record(z.string()),
        values: z.array(z.tuple([z.number(), z.string()])),
      })
    ),
  }),
});

const errorResponseSchema = z.object({
  status: z.literal('error'),
  errorType: z.string().optional(),
  error: z.string(),
});

type MatrixSeries = z.infer<typeof matrixResponseSchema>['data']['result'][number];
type PartialBar = Partial<Record<OhlcvField, number>>;

export interface PrometheusBarStoreOptions {
  http?: Pick<AxiosInstance, 'get'>;
  config?: PrometheusConfig;
  /** Gauge name prefix, default from the config */
  metricPrefix?: string;
  /** Value of the `timeframe` label, default '1m' */
  timeframeLabel?: string;
}

export class PrometheusBarStore implements BarStorePort {
  readonly name = 'prometheus';
  private readonly http: Pick<AxiosInstance, 'get'>;
  private readonly config: PrometheusConfig;
  private readonly metricPrefix: string;
  private readonly timeframeLabel: string;

  constructor(options: PrometheusBarStoreOptions = {}) {
    this.config = options.config ?? getPrometheusConfig();
    this.http =
      options.http ?? axios.create({ baseURL: this.config.url, timeout: this.config.timeoutMs });
    this.metricPrefix = options.metricPrefix ?? this.config.metricPrefix;
    this.timeframeLabel = options.timeframeLabel ?? '1m';
  }

  /**
   * PromQL range selector for one component over [start, end)
   */
  buildSelector(field: OhlcvField, symbol: string, start: number, end: number): string {
    const labels = [
      `currency_pair="${escapeLabelValue(symbol)}"`,
      `timeframe="${escapeLabelValue(this.timeframeLabel)}"`,
    ].join(',');
    return `${this.metricPrefix}_${field}{${labels}}[${end - start}s]`;
  }

  async query(symbol: string, start: number, end: number): Promise<Bar[]> {
    if (end <= start) {
      return [];
    }

    const seriesByField = await Promise.all(
      OHLCV_FIELDS.map(async (field) => [field, await this.fetchSeries(field, symbol, start, end)] as const)
    );

    const partials = new Map<number, PartialBar>();
    for (const [field, seriesList] of seriesByField) {
      for (const series of seriesList) {
        const labelled = parseTimestampLabel(series.metric.timestamp);
        for (const [sampleTime, rawValue] of series.values) {
          const periodStart = labelled ?? alignToTimeframe(Math.floor(sampleTime), SOURCE_TIMEFRAME_SECONDS);
          const entry = partials.get(periodStart) ?? {};
          entry[field] = Number(rawValue);
          partials.set(periodStart, entry);
        }
      }
    }

    const bars: Bar[] = [];
    let incomplete = 0;
    for (const periodStart of [...partials.keys()].sort((a, b) => a - b)) {
      if (periodStart < start || periodStart >= end) {
        continue;
      }
      const entry = partials.get(periodStart) ?? {};
      const { open, high, low, close } = entry;
      if (open === undefined || high === undefined || low === undefined || close === undefined) {
        incomplete++;
        continue;
      }
      bars.push({
        symbol,
        timeframe: SOURCE_TIMEFRAME_SECONDS,
        periodStart,
        open,
        high,
        low,
        close,
        volume: entry.volume ?? 0,
      });
    }

    if (incomplete > 0) {
      logger.warn('Skipped minutes missing an OHLC component', { symbol, start, end, incomplete });
    }
    logger.debug('Prometheus bars loaded', { symbol, start, end, count: bars.length });
    return bars;
  }

  private async fetchSeries(
    field: OhlcvField,
    symbol: string,
    start: number,
    end: number
  ): Promise<MatrixSeries[]> {
    const query = this.buildSelector(field, symbol, start, end);
    const context = { symbol, start, end, query };
    let body: unknown;

    try {
      const response = await this.http.get<unknown>('/api/v1/query', {
        params: { query, time: end - 1 },
      });
      body = response.data;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new StoreQueryError(`Prometheus request failed: ${message}`, this.name, context);
    }

    const failure = errorResponseSchema.safeParse(body);
    if (failure.success) {
      throw new StoreQueryError(`Prometheus query error: ${failure.data.error}`, this.name, {
        ...context,
        errorType: failure.data.errorType,
      });
    }

    const parsed = matrixResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new StoreQueryError('Prometheus returned an unexpected response shape', this.name, context);
    }
    return parsed.data.data.result;
  }
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function parseTimestampLabel(label: string | undefined): number | undefined {
  if (label === undefined) {
    return undefined;
  }
  const parsed = DateTime.fromFormat(label, 'yyyyMMddHHmmss', { zone: 'utc' });
  return parsed.isValid ? Math.floor(parsed.toSeconds()) : undefined;
}
