/**
 * Error Handler - User-friendly error messages, no secret leakage
 */

import { AppError, ConfigurationError, ValidationError } from '@candlefold/utils';

/**
 * Sensitive patterns that should never appear in error messages
 */
const SENSITIVE_PATTERNS = [/password/i, /secret/i, /token/i, /authorization/i, /bearer/i];

function sanitizeErrorMessage(message: string): string {
  if (SENSITIVE_PATTERNS.some((pattern) => pattern.test(message))) {
    return 'An error occurred. Please check your configuration and try again.';
  }
  return message;
}

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof AppError) {
    return `${error.code}: ${sanitizeErrorMessage(error.message)}`;
  }
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message);
  }
  if (typeof error === 'string') {
    return sanitizeErrorMessage(error);
  }
  return 'An unexpected error occurred';
}

/**
 * 2 for bad input or configuration, 1 for everything else
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ValidationError || error instanceof ConfigurationError) {
    return 2;
  }
  return 1;
}
