/**
 * @candlefold/utils - Shared utilities package
 *
 * Logger, configuration loading and the error taxonomy. No domain code.
 */

export { logger, Logger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

export * from './config/index.js';

export * from './errors.js';
export { handleError, retryWithBackoff } from './error-handler.js';
export type { ErrorHandlerResult } from './error-handler.js';
