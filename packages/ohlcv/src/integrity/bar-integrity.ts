/**
 * Bar Integrity Checks
 *
 * Detects bars that break OHLCV invariants. Broken bars are never repaired:
 * a silently corrected bar hides a data bug upstream.
 */

import type { Bar } from '@candlefold/core';
import { MalformedBarError } from '@candlefold/utils';

/**
 * List every invariant the bar breaks (empty when the bar is sound)
 */
export function checkBarIntegrity(bar: Bar): string[] {
  const problems: string[] = [];

  if (!bar.symbol) {
    problems.push('missing symbol');
  }
  if (!Number.isInteger(bar.timeframe) || bar.timeframe <= 0) {
    problems.push(`timeframe ${bar.timeframe} is not a positive integer`);
  } else if (!Number.isInteger(bar.periodStart) || bar.periodStart % bar.timeframe !== 0) {
    problems.push(`periodStart ${bar.periodStart} is not aligned to ${bar.timeframe}s`);
  }

  const prices = { open: bar.open, high: bar.high, low: bar.low, close: bar.close };
  const nonFinite = Object.entries(prices).filter(([, value]) => !Number.isFinite(value));
  for (const [field, value] of nonFinite) {
    problems.push(`${field} is not finite (${value})`);
  }

  if (nonFinite.length === 0) {
    if (bar.high < Math.max(bar.open, bar.close, bar.low)) {
      problems.push(`high ${bar.high} is below open/close/low`);
    }
    if (bar.low > Math.min(bar.open, bar.close, bar.high)) {
      problems.push(`low ${bar.low} is above open/close/high`);
    }
  }

  if (!Number.isFinite(bar.volume) || bar.volume < 0) {
    problems.push(`volume ${bar.volume} is negative or not finite`);
  }

  return problems;
}

export function assertBarIntegrity(bar: Bar, context?: Record<string, unknown>): void {
  const problems = checkBarIntegrity(bar);
  if (problems.length > 0) {
    throw new MalformedBarError(problems, {
      symbol: bar.symbol,
      periodStart: bar.periodStart,
      ...context,
    });
  }
}
