/**
 * Error Handler
 * =============
 * Centralized error handling and retry utilities.
 */

import { AppError, isRetryableError } from './errors.js';
import { logger } from './logger.js';

export interface ErrorHandlerResult {
  handled: boolean;
  message: string;
  code?: string;
  shouldRetry: boolean;
}

/**
 * Handle and log error appropriately
 */
export function handleError(
  error: Error | unknown,
  context?: Record<string, unknown>
): ErrorHandlerResult {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AppError) {
    if (err.isOperational) {
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
        },
      });
    } else {
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }
  } else {
    logger.error('Unknown error occurred', err, context);
  }

  return {
    handled: true,
    message: err.message,
    code: err instanceof AppError ? err.code : undefined,
    shouldRetry: isRetryableError(err),
  };
}

/**
 * Retry with exponential backoff. Only retryable errors are retried;
 * anything else is rethrown on the first failure.
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  maxRetries: number = 3,
  initialDelayMs: number = 1000,
  context?: Record<string, unknown>
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error instanceof Error ? error : new Error(String(error)))) {
        throw error;
      }

      if (attempt === maxRetries) {
        break;
      }

      const delayMs = initialDelayMs * Math.pow(2, attempt);
      logger.debug('Retrying after error', {
        attempt: attempt + 1,
        maxRetries,
        delayMs,
        ...context,
      });

      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  handleError(lastError, { ...context, maxRetries });
  throw lastError;
}
