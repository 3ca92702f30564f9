import type { Bar, BarStorePort } from '@candlefold/core';
import {
  AppError,
  getStoreRetryConfig,
  retryWithBackoff,
  StoreQueryError,
  type StoreRetryConfig,
} from '@candlefold/utils';
import { logger } from '../logger.js';

/**
 * Wraps a bar store with bounded exponential backoff.
 *
 * Unexpected failures are wrapped as StoreQueryError and retried. Other
 * application errors, such as a rejected range, pass through on the first
 * attempt.
 */
export class RetryingBarStore implements BarStorePort {
  readonly name: string;
  private readonly retry: StoreRetryConfig;

  constructor(
    private readonly inner: BarStorePort,
    retry: StoreRetryConfig = getStoreRetryConfig()
  ) {
    this.name = inner.name;
    this.retry = retry;
  }

  async query(symbol: string, start: number, end: number): Promise<Bar[]> {
    const context = { store: this.inner.name, symbol, start, end };

    return retryWithBackoff(
      async () => {
        try {
          return await this.inner.query(symbol, start, end);
        } catch (error: unknown) {
          if (error instanceof StoreQueryError) {
            logger.warn('Bar store query failed', { ...context, error: error.message });
            throw error;
          }
          if (error instanceof AppError) {
            throw error;
          }
          const message = error instanceof Error ? error.message : String(error);
          throw new StoreQueryError(message, this.inner.name, context);
        }
      },
      this.retry.maxRetries,
      this.retry.initialDelayMs,
      context
    );
  }
}
