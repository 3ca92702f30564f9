/**
 * Timeframe conversion utilities
 *
 * Canonical conversion between duration labels ('1m', '15m', '4h', '1d')
 * and whole seconds.
 */

import { DateTime } from 'luxon';
import { InvalidTimeframeError, ValidationError } from '@candlefold/utils';

/** Granularity of bars held by the store */
export const SOURCE_TIMEFRAME_SECONDS = 60;

const DURATION_PATTERN = /^(\d+)(s|m|h|d|w)$/;

const UNIT_SECONDS = {
  w: 604800,
  d: 86400,
  h: 3600,
  m: 60,
  s: 1,
} as const;

type UnitSuffix = keyof typeof UNIT_SECONDS;

function isUnitSuffix(value: string): value is UnitSuffix {
  return value in UNIT_SECONDS;
}

/**
 * Convert a duration label to seconds
 */
export function parseDuration(label: string): number {
  const match = DURATION_PATTERN.exec(label.trim());
  const amount = match?.[1];
  const unit = match?.[2];
  if (amount === undefined || unit === undefined || !isUnitSuffix(unit)) {
    throw new ValidationError(`Invalid duration label: ${label}`, { label });
  }
  return Number(amount) * UNIT_SECONDS[unit];
}

/**
 * Convert seconds to the shortest exact label ('3600' -> '1h')
 */
export function formatDuration(seconds: number): string {
  const suffixes: UnitSuffix[] = ['w', 'd', 'h', 'm'];
  for (const suffix of suffixes) {
    const size = UNIT_SECONDS[suffix];
    if (seconds > 0 && seconds % size === 0) {
      return `${seconds / size}${suffix}`;
    }
  }
  return `${seconds}s`;
}

/**
 * Parse a timeframe label and check it is usable as a resample target
 */
export function parseTimeframe(label: string, sourceTimeframe: number = SOURCE_TIMEFRAME_SECONDS): number {
  const seconds = parseDuration(label);
  assertTimeframe(seconds, sourceTimeframe);
  return seconds;
}

export function assertTimeframe(timeframe: number, sourceTimeframe: number = SOURCE_TIMEFRAME_SECONDS): void {
  if (!Number.isInteger(timeframe) || timeframe <= 0 || timeframe % sourceTimeframe !== 0) {
    throw new InvalidTimeframeError(timeframe, sourceTimeframe);
  }
}

/**
 * Start of the epoch-aligned window containing `timestamp`
 */
export function alignToTimeframe(timestamp: number, timeframe: number): number {
  return Math.floor(timestamp / timeframe) * timeframe;
}

/**
 * Parse an ISO-8601 instant to UNIX seconds; offsetless input is UTC
 */
export function parseInstant(iso: string): number {
  const parsed = DateTime.fromISO(iso, { zone: 'utc' });
  if (!parsed.isValid) {
    throw new ValidationError(`Invalid ISO-8601 timestamp: ${iso}`, {
      value: iso,
      reason: parsed.invalidReason,
    });
  }
  return Math.floor(parsed.toSeconds());
}

export function formatInstant(seconds: number): string {
  return DateTime.fromSeconds(seconds, { zone: 'utc' }).toISO() ?? String(seconds);
}
