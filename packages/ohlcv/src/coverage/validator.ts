/**
 * OHLCV Coverage Validator
 *
 * Measures how much of a range a bar series covers and where the gaps are.
 */

import type { Bar, TimeRange } from '@candlefold/core';
import { alignToTimeframe, formatInstant } from '@candlefold/core';

export interface Gap {
  from: string;
  to: string;
  missingBars: number;
}

export interface CoverageMetrics {
  expectedBars: number;
  actualBars: number;
  coveragePercent: number;
  gaps: Gap[];
}

/**
 * Validate coverage of `bars` over the whole windows of `timeframe` inside
 * `range`
 *
 * @param bars - Bars sorted by periodStart
 */
export function validateCoverage(bars: readonly Bar[], timeframe: number, range: TimeRange): CoverageMetrics {
  const first = Math.ceil(range.start / timeframe) * timeframe;
  const last = alignToTimeframe(range.end, timeframe);
  const expectedBars = Math.max(0, (last - first) / timeframe);

  const gaps: Gap[] = [];
  let actualBars = 0;
  let cursor = first;

  const pushGap = (from: number, to: number): void => {
    gaps.push({
      from: formatInstant(from),
      to: formatInstant(to),
      missingBars: (to - from) / timeframe,
    });
  };

  for (const bar of bars) {
    if (bar.periodStart < first || bar.periodStart >= last) {
      continue;
    }
    if (bar.periodStart > cursor) {
      pushGap(cursor, bar.periodStart);
    }
    actualBars++;
    cursor = bar.periodStart + timeframe;
  }

  if (cursor < last) {
    pushGap(cursor, last);
  }

  const coveragePercent = expectedBars > 0 ? (actualBars / expectedBars) * 100 : 0;

  return {
    expectedBars,
    actualBars,
    coveragePercent,
    gaps,
  };
}

/**
 * Get coverage status based on percentage
 */
export function getCoverageStatus(coveragePercent: number): 'good' | 'partial' | 'poor' {
  if (coveragePercent >= 95) {
    return 'good';
  } else if (coveragePercent >= 80) {
    return 'partial';
  } else {
    return 'poor';
  }
}
