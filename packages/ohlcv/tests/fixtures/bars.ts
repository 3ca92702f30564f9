import type { Bar } from '@candlefold/core';

/**
 * 1-minute bar for minute `minute` after the epoch.
 * open = 100 + minute, close = open + 0.5, high = close + 1, low = open - 1,
 * volume = 10.
 */
export function minuteBar(minute: number, overrides: Partial<Bar> = {}): Bar {
  const open = 100 + minute;
  const close = open + 0.5;
  return {
    symbol: 'EURUSD',
    timeframe: 60,
    periodStart: minute * 60,
    open,
    high: close + 1,
    low: open - 1,
    close,
    volume: 10,
    ...overrides,
  };
}

export function minuteBars(minutes: Iterable<number>): Bar[] {
  return [...minutes].map((minute) => minuteBar(minute));
}

export function range(from: number, toExclusive: number): number[] {
  return Array.from({ length: toExclusive - from }, (_, i) => from + i);
}
