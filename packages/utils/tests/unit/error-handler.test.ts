import { describe, it, expect, vi, beforeEach } from 'vitest';
import { handleError, retryWithBackoff } from '../../src/error-handler.js';
import { LeakageViolationError, StoreQueryError, ValidationError } from '../../src/errors.js';
import { logger } from '../../src/logger.js';

vi.mock('../../src/logger.js', () => ({
  logger: {
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('error-handler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('handleError', () => {
    it('logs operational errors as warnings', () => {
      const error = new ValidationError('Invalid input', { field: 'symbol' });
      const result = handleError(error, { command: 'resample' });

      expect(result).toEqual({
        handled: true,
        message: 'Invalid input',
        code: 'VALIDATION_ERROR',
        shouldRetry: false,
      });
      expect(logger.warn).toHaveBeenCalledWith(
        'Operational error occurred',
        expect.objectContaining({
          field: 'symbol',
          command: 'resample',
          error: expect.objectContaining({ name: 'ValidationError', code: 'VALIDATION_ERROR' }),
        })
      );
    });

    it('logs non-operational errors as errors', () => {
      const error = new LeakageViolationError('bar closes after reference');
      const result = handleError(error);

      expect(result.code).toBe('LEAKAGE_VIOLATION');
      expect(result.shouldRetry).toBe(false);
      expect(logger.error).toHaveBeenCalledWith('Application error occurred', error, expect.any(Object));
    });

    it('wraps non-Error values', () => {
      const result = handleError('boom');

      expect(result).toEqual({ handled: true, message: 'boom', code: undefined, shouldRetry: false });
      expect(logger.error).toHaveBeenCalledWith('Unknown error occurred', expect.any(Error), undefined);
    });

    it('marks store failures as retryable', () => {
      expect(handleError(new StoreQueryError('down', 'clickhouse')).shouldRetry).toBe(true);
    });
  });

  describe('retryWithBackoff', () => {
    it('retries retryable errors until the call succeeds', async () => {
      const fn = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new StoreQueryError('down', 'clickhouse'))
        .mockRejectedValueOnce(new StoreQueryError('down', 'clickhouse'))
        .mockResolvedValue('ok');

      await expect(retryWithBackoff(fn, 3, 1)).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(3);
      expect(logger.debug).toHaveBeenCalledTimes(2);
    });

    it('rethrows non-retryable errors at once', async () => {
      const error = new ValidationError('bad');
      const fn = vi.fn<() => Promise<string>>().mockRejectedValue(error);

      await expect(retryWithBackoff(fn, 3, 1)).rejects.toBe(error);
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('gives up after maxRetries retries', async () => {
      const error = new StoreQueryError('down', 'prometheus');
      const fn = vi.fn<() => Promise<string>>().mockRejectedValue(error);

      await expect(retryWithBackoff(fn, 2, 1)).rejects.toBe(error);
      expect(fn).toHaveBeenCalledTimes(3);
      expect(logger.warn).toHaveBeenCalledWith('Operational error occurred', expect.any(Object));
    });
  });
});
