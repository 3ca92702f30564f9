import { describe, it, expect } from 'vitest';
import { parseRunConfig, resolveRunConfig } from '../../src/schemas/run-config.js';
import { ConfigurationError } from '@candlefold/utils';

const baseInput = {
  symbol: 'EURUSD',
  range: { start: '2024-01-01T00:00:00Z', end: '2024-01-11T00:00:00Z' },
  timeframes: ['1h', '15m', '1m', '15m'],
  trainWindow: '3d',
  evalWindow: '1d',
  step: '1d',
};

describe('parseRunConfig', () => {
  it('fills defaults', () => {
    const config = parseRunConfig(baseInput);

    expect(config.foldPolicy).toBe('rolling');
    expect(config.embargo).toBe('0m');
    expect(config.horizon).toBe(1);
    expect(config.allowPartialBars).toBe(false);
    expect(config.maxParallelFolds).toBe(1);
    expect(config.foldExecution).toBe('isolated');
    expect(config.foldTimeoutMs).toBeUndefined();
  });

  it('rejects a range that ends before it starts', () => {
    expect(() =>
      parseRunConfig({ ...baseInput, range: { start: '2024-01-02T00:00:00Z', end: '2024-01-01T00:00:00Z' } })
    ).toThrow('range.end: range.end must be after range.start');
  });

  it('rejects parallel incremental execution', () => {
    expect(() => parseRunConfig({ ...baseInput, foldExecution: 'incremental', maxParallelFolds: 2 })).toThrow(
      'maxParallelFolds: incremental fold execution runs folds sequentially; maxParallelFolds must be 1'
    );
  });

  it('rejects zero-length windows', () => {
    expect(() => parseRunConfig({ ...baseInput, step: '0d' })).toThrow('step: step must be positive');
  });

  it('rejects malformed labels and timestamps', () => {
    try {
      parseRunConfig({ ...baseInput, trainWindow: 'three days', range: { start: 'soon', end: baseInput.range.end } });
      expect.fail('expected ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.context?.issues).toEqual([
          'range.start: expected an ISO-8601 timestamp',
          'trainWindow: expected a duration label such as 15m, 4h or 3d',
        ]);
      }
    }
  });
});

describe('resolveRunConfig', () => {
  it('converts everything to seconds and orders timeframes', () => {
    const resolved = resolveRunConfig(
      parseRunConfig({ ...baseInput, embargo: '2h', horizon: 3, foldTimeoutMs: 5000 })
    );

    expect(resolved).toEqual({
      symbol: 'EURUSD',
      range: { start: 1704067200, end: 1704931200 },
      timeframes: [60, 900, 3600],
      foldPolicy: 'rolling',
      trainWindow: 259200,
      evalWindow: 86400,
      step: 86400,
      embargo: 7200,
      horizon: 3,
      allowPartialBars: false,
      maxParallelFolds: 1,
      foldExecution: 'isolated',
      foldTimeoutMs: 5000,
    });
  });
});
