import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigurationError,
  FoldExecutionError,
  InsufficientRangeError,
  InvalidTimeframeError,
  LeakageViolationError,
  MalformedBarError,
  StoreQueryError,
  TimeoutError,
  UnsortedInputError,
  ValidationError,
  isRetryableError,
} from '../../src/errors.js';

describe('error taxonomy', () => {
  it.each([
    [new ValidationError('bad'), 'VALIDATION_ERROR', true],
    [new ConfigurationError('bad', 'KEY'), 'CONFIGURATION_ERROR', true],
    [new InvalidTimeframeError(90, 60), 'INVALID_TIMEFRAME', true],
    [new UnsortedInputError('unsorted', 3), 'UNSORTED_INPUT', false],
    [new MalformedBarError(['high below low']), 'MALFORMED_BAR', false],
    [new InsufficientRangeError('short'), 'INSUFFICIENT_RANGE', true],
    [new LeakageViolationError('leak'), 'LEAKAGE_VIOLATION', false],
    [new FoldExecutionError('failed', 2), 'FOLD_EXECUTION_FAILURE', true],
    [new TimeoutError('slow', 100), 'TIMEOUT_ERROR', true],
    [new StoreQueryError('down', 'clickhouse'), 'STORE_QUERY_FAILURE', true],
  ])('%s carries code and operational flag', (error, code, operational) => {
    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe(code);
    expect(error.isOperational).toBe(operational);
  });

  it('names errors after their class', () => {
    expect(new LeakageViolationError('leak').name).toBe('LeakageViolationError');
  });

  it('describes the timeframe in InvalidTimeframeError', () => {
    const error = new InvalidTimeframeError(90, 60);
    expect(error.message).toBe('Timeframe 90s is not a positive integer multiple of 60s');
    expect(error.timeframe).toBe(90);
    expect(error.context).toEqual({ timeframe: 90, sourceTimeframe: 60 });
  });

  it('joins problems in MalformedBarError', () => {
    const error = new MalformedBarError(['a', 'b'], { index: 4 });
    expect(error.message).toBe('Malformed bar: a; b');
    expect(error.problems).toEqual(['a', 'b']);
    expect(error.context).toEqual({ problems: ['a', 'b'], index: 4 });
  });

  it('serialises to JSON', () => {
    const json = new FoldExecutionError('fit failed', 1).toJSON();
    expect(json).toMatchObject({
      name: 'FoldExecutionError',
      message: 'fit failed',
      code: 'FOLD_EXECUTION_FAILURE',
      context: { foldIndex: 1 },
      isOperational: true,
    });
  });

  it('only retries store failures and timeouts', () => {
    expect(isRetryableError(new StoreQueryError('down', 'prometheus'))).toBe(true);
    expect(isRetryableError(new TimeoutError())).toBe(true);
    expect(isRetryableError(new ValidationError('bad'))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });
});
