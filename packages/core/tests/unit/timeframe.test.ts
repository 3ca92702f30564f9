import { describe, it, expect } from 'vitest';
import {
  alignToTimeframe,
  assertTimeframe,
  formatDuration,
  formatInstant,
  parseDuration,
  parseInstant,
  parseTimeframe,
} from '../../src/time/timeframe.js';
import { InvalidTimeframeError, ValidationError } from '@candlefold/utils';

describe('parseDuration', () => {
  it.each([
    ['30s', 30],
    ['1m', 60],
    ['15m', 900],
    ['4h', 14400],
    ['3d', 259200],
    ['1w', 604800],
    [' 90m ', 5400],
  ])('parses %s', (label, seconds) => {
    expect(parseDuration(label)).toBe(seconds);
  });

  it.each(['', 'm', '1.5h', '-1m', '10y', '15 m'])('rejects %j', (label) => {
    expect(() => parseDuration(label)).toThrow(ValidationError);
  });
});

describe('formatDuration', () => {
  it.each([
    [60, '1m'],
    [900, '15m'],
    [3600, '1h'],
    [5400, '90m'],
    [86400, '1d'],
    [1209600, '2w'],
    [45, '45s'],
  ])('formats %d as %s', (seconds, label) => {
    expect(formatDuration(seconds)).toBe(label);
  });
});

describe('parseTimeframe', () => {
  it('accepts multiples of the source granularity', () => {
    expect(parseTimeframe('15m')).toBe(900);
    expect(parseTimeframe('1m')).toBe(60);
  });

  it('rejects timeframes that are not whole minutes', () => {
    expect(() => parseTimeframe('90s')).toThrow(InvalidTimeframeError);
  });

  it('rejects zero', () => {
    expect(() => parseTimeframe('0m')).toThrow(InvalidTimeframeError);
  });

  it('honours a custom source granularity', () => {
    expect(parseTimeframe('10s', 5)).toBe(10);
    expect(() => assertTimeframe(600, 7)).toThrow('Timeframe 600s is not a positive integer multiple of 7s');
  });
});

describe('alignToTimeframe', () => {
  it('floors to the epoch-aligned window start', () => {
    expect(alignToTimeframe(3661, 3600)).toBe(3600);
    expect(alignToTimeframe(3600, 3600)).toBe(3600);
    expect(alignToTimeframe(59, 60)).toBe(0);
  });
});

describe('instants', () => {
  it('parses offsetless ISO timestamps as UTC', () => {
    expect(parseInstant('2024-01-01T00:00:00')).toBe(1704067200);
    expect(parseInstant('2024-01-01')).toBe(1704067200);
  });

  it('honours explicit offsets', () => {
    expect(parseInstant('2024-01-01T01:00:00+01:00')).toBe(1704067200);
  });

  it('rejects garbage', () => {
    expect(() => parseInstant('yesterday')).toThrow(ValidationError);
  });

  it('formats seconds as UTC ISO', () => {
    expect(formatInstant(1704067200)).toBe('2024-01-01T00:00:00.000Z');
  });
});
