/**
 * Temporal Aligner
 * ================
 * As-of (backward-only) join of several timeframe series onto one reference
 * clock.
 *
 * For a reference time t a timeframe slot holds the most recent closed bar
 * with periodEnd <= t, or null. Each series keeps one cursor that only moves
 * forward, so a pass is linear in the total number of bars.
 */

import type { AlignedFeatureVector, Bar } from '@candlefold/core';
import { barPeriodEnd } from '@candlefold/core';
import { LeakageViolationError, MalformedBarError, UnsortedInputError } from '@candlefold/utils';

interface SeriesCursor {
  readonly timeframe: number;
  readonly bars: readonly Bar[];
  next: number;
  lastClosed: Bar | null;
}

/**
 * Throws when `bar` was not closed at `referenceTimestamp`
 */
export function assertNoLookahead(bar: Bar | null, referenceTimestamp: number): void {
  if (bar === null) {
    return;
  }
  if (barPeriodEnd(bar) > referenceTimestamp || bar.partial) {
    throw new LeakageViolationError(
      `Bar ${bar.symbol}@${bar.timeframe}s starting ${bar.periodStart} closes at ${barPeriodEnd(bar)}, after reference ${referenceTimestamp}`,
      {
        symbol: bar.symbol,
        timeframe: bar.timeframe,
        periodStart: bar.periodStart,
        referenceTimestamp,
      }
    );
  }
}

function assertStrictlyIncreasing(values: readonly number[], label: string): void {
  for (let i = 1; i < values.length; i++) {
    if (values[i] <= values[i - 1]) {
      throw new UnsortedInputError(
        `${label} is not strictly increasing at index ${i}: ${values[i]} follows ${values[i - 1]}`,
        i
      );
    }
  }
}

/**
 * Close times of the closed bars of the reference timeframe
 */
export function referenceClock(bars: readonly Bar[]): number[] {
  const closes = bars.filter((bar) => !bar.partial).map(barPeriodEnd);
  assertStrictlyIncreasing(closes, 'Reference bars');
  return closes;
}

/**
 * Build one AlignedFeatureVector per reference timestamp
 *
 * @param referenceTimes - strictly increasing timestamps
 * @param series - bars per timeframe, each strictly increasing in periodStart
 */
export function alignTimeframes(
  referenceTimes: readonly number[],
  series: ReadonlyMap<number, readonly Bar[]>
): AlignedFeatureVector[] {
  assertStrictlyIncreasing(referenceTimes, 'Reference clock');

  const cursors: SeriesCursor[] = [];
  for (const [timeframe, bars] of series) {
    for (const bar of bars) {
      if (bar.timeframe !== timeframe) {
        throw new MalformedBarError([`bar timeframe ${bar.timeframe}s filed under ${timeframe}s`], {
          periodStart: bar.periodStart,
        });
      }
    }
    assertStrictlyIncreasing(
      bars.map((bar) => bar.periodStart),
      `Series ${timeframe}s`
    );
    cursors.push({ timeframe, bars, next: 0, lastClosed: null });
  }

  const vectors: AlignedFeatureVector[] = [];

  for (const referenceTimestamp of referenceTimes) {
    const slots = new Map<number, Bar | null>();

    for (const cursor of cursors) {
      while (cursor.next < cursor.bars.length && barPeriodEnd(cursor.bars[cursor.next]) <= referenceTimestamp) {
        const bar = cursor.bars[cursor.next];
        if (!bar.partial) {
          cursor.lastClosed = bar;
        }
        cursor.next++;
      }

      assertNoLookahead(cursor.lastClosed, referenceTimestamp);
      slots.set(cursor.timeframe, cursor.lastClosed);
    }

    vectors.push(Object.freeze({ referenceTimestamp, bars: slots }));
  }

  return vectors;
}

export function isFullyPopulated(vector: AlignedFeatureVector): boolean {
  for (const bar of vector.bars.values()) {
    if (bar === null) {
      return false;
    }
  }
  return true;
}

/**
 * Drop leading vectors until every timeframe has a closed bar. Slots never
 * empty again once filled, so everything after the first full vector is kept.
 */
export function dropIncompleteLeading(vectors: readonly AlignedFeatureVector[]): AlignedFeatureVector[] {
  const firstFull = vectors.findIndex(isFullyPopulated);
  return firstFull === -1 ? [] : vectors.slice(firstFull);
}
