/**
 * Bar Resampler
 * =============
 * Rebuilds higher-timeframe bars from a run of 1-minute bars.
 *
 * Windows are aligned to UNIX epoch 0. A window without source bars is
 * omitted, so output is sparse. A window that has not fully elapsed at the
 * cutoff (`asOf`) is dropped unless partial bars are requested, in which case
 * it is returned with `partial: true`.
 */

import type { Bar, ResampleWindow } from '@candlefold/core';
import {
  SOURCE_TIMEFRAME_SECONDS,
  alignToTimeframe,
  assertTimeframe,
  barPeriodEnd,
} from '@candlefold/core';
import { MalformedBarError, UnsortedInputError } from '@candlefold/utils';
import { assertBarIntegrity } from './integrity/bar-integrity.js';
import { logger } from './logger.js';

export interface ResampleOptions {
  /** Granularity of the input bars (default 60s) */
  sourceTimeframe?: number;
  /**
   * Cutoff time. Source bars closing after it are ignored and windows ending
   * after it are partial. Defaults to the close of the last source bar.
   */
  asOf?: number;
  /** Keep the trailing in-progress window, flagged partial */
  allowPartial?: boolean;
}

interface WindowAccumulator {
  periodStart: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Window of `timeframe` that contains `timestamp`
 */
export function windowFor(timestamp: number, timeframe: number): ResampleWindow {
  const periodStart = alignToTimeframe(timestamp, timeframe);
  return { timeframe, periodStart, periodEnd: periodStart + timeframe };
}

/**
 * Check that `bars` is a sound, strictly increasing series of one symbol at
 * the source granularity
 */
export function validateSourceBars(
  bars: readonly Bar[],
  sourceTimeframe: number = SOURCE_TIMEFRAME_SECONDS
): void {
  const symbol = bars[0]?.symbol;

  for (let i = 0; i < bars.length; i++) {
    const bar = bars[i];
    assertBarIntegrity(bar, { index: i });

    if (bar.timeframe !== sourceTimeframe) {
      throw new MalformedBarError([`timeframe ${bar.timeframe}s differs from source ${sourceTimeframe}s`], {
        index: i,
        periodStart: bar.periodStart,
      });
    }
    if (bar.symbol !== symbol) {
      throw new MalformedBarError([`symbol ${bar.symbol} differs from ${symbol}`], { index: i });
    }
    if (i > 0 && bar.periodStart <= bars[i - 1].periodStart) {
      throw new UnsortedInputError(
        `Bars are not strictly increasing at index ${i}: ${bar.periodStart} follows ${bars[i - 1].periodStart}`,
        i,
        { symbol }
      );
    }
  }
}

/**
 * Resample 1-minute bars into bars of `timeframe` seconds
 */
export function resampleBars(bars: readonly Bar[], timeframe: number, options: ResampleOptions = {}): Bar[] {
  const sourceTimeframe = options.sourceTimeframe ?? SOURCE_TIMEFRAME_SECONDS;
  assertTimeframe(timeframe, sourceTimeframe);
  validateSourceBars(bars, sourceTimeframe);

  if (bars.length === 0) {
    return [];
  }

  const symbol = bars[0].symbol;
  const asOf = options.asOf ?? barPeriodEnd(bars[bars.length - 1]);
  const allowPartial = options.allowPartial ?? false;
  const resampled: Bar[] = [];

  const flush = (acc: WindowAccumulator): void => {
    const partial = acc.periodStart + timeframe > asOf;
    if (partial && !allowPartial) {
      return;
    }
    resampled.push(
      Object.freeze({
        symbol,
        timeframe,
        periodStart: acc.periodStart,
        open: acc.open,
        high: acc.high,
        low: acc.low,
        close: acc.close,
        volume: acc.volume,
        ...(partial ? { partial: true } : {}),
      })
    );
  };

  let current: WindowAccumulator | null = null;

  for (const bar of bars) {
    // Input is sorted, so every later bar is unknown at the cutoff too
    if (barPeriodEnd(bar) > asOf) {
      break;
    }

    const periodStart = alignToTimeframe(bar.periodStart, timeframe);
    if (current && current.periodStart === periodStart) {
      if (bar.high > current.high) current.high = bar.high;
      if (bar.low < current.low) current.low = bar.low;
      current.close = bar.close;
      current.volume += bar.volume;
      continue;
    }

    if (current) {
      flush(current);
    }
    current = {
      periodStart,
      open: bar.open,
      high: bar.high,
      low: bar.low,
      close: bar.close,
      volume: bar.volume,
    };
  }

  if (current) {
    flush(current);
  }

  return resampled;
}

/**
 * Resample one source series into several timeframes. Each timeframe is
 * computed independently of the others.
 */
export function resampleMany(
  bars: readonly Bar[],
  timeframes: readonly number[],
  options: ResampleOptions = {}
): Map<number, Bar[]> {
  const result = new Map<number, Bar[]>();
  for (const timeframe of timeframes) {
    result.set(timeframe, resampleBars(bars, timeframe, options));
  }
  logger.debug('Resampled series', {
    symbol: bars[0]?.symbol,
    sourceBars: bars.length,
    output: Object.fromEntries([...result].map(([timeframe, series]) => [timeframe, series.length])),
  });
  return result;
}
