/**
 * Custom Error Classes
 * ====================
 * Error taxonomy for bar reconstruction and walk-forward evaluation.
 *
 * Operational errors describe conditions a caller can act on (bad options,
 * a failed fold, a flaky store). Non-operational errors signal broken data or
 * a broken invariant and must abort whatever produced them.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    context?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging and reports
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for option and argument failures
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context);
  }
}

/**
 * Configuration error - for environment and run-file issues
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { configKey, ...context });
  }
}

/**
 * Target timeframe is not a positive integer multiple of the source granularity
 */
export class InvalidTimeframeError extends AppError {
  public readonly timeframe: number;

  constructor(timeframe: number, sourceTimeframe: number, context?: Record<string, unknown>) {
    super(
      `Timeframe ${timeframe}s is not a positive integer multiple of ${sourceTimeframe}s`,
      'INVALID_TIMEFRAME',
      { timeframe, sourceTimeframe, ...context }
    );
    this.timeframe = timeframe;
  }
}

/**
 * Input sequence is not strictly increasing in time
 */
export class UnsortedInputError extends AppError {
  public readonly index: number;

  constructor(message: string, index: number, context?: Record<string, unknown>) {
    super(message, 'UNSORTED_INPUT', { index, ...context }, false);
    this.index = index;
  }
}

/**
 * A bar breaks an OHLCV invariant (alignment, price ordering, volume)
 */
export class MalformedBarError extends AppError {
  public readonly problems: string[];

  constructor(problems: string[], context?: Record<string, unknown>) {
    super(`Malformed bar: ${problems.join('; ')}`, 'MALFORMED_BAR', { problems, ...context }, false);
    this.problems = problems;
  }
}

/**
 * Data range cannot hold a single full fold
 */
export class InsufficientRangeError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INSUFFICIENT_RANGE', context);
  }
}

/**
 * A selected bar closes after the time it was selected for.
 * Always a defect; never recovered from.
 */
export class LeakageViolationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'LEAKAGE_VIOLATION', context, false);
  }
}

/**
 * External fit/predict failure for one fold
 */
export class FoldExecutionError extends AppError {
  public readonly foldIndex: number;

  constructor(message: string, foldIndex: number, context?: Record<string, unknown>) {
    super(message, 'FOLD_EXECUTION_FAILURE', { foldIndex, ...context });
    this.foldIndex = foldIndex;
  }
}

/**
 * Timeout error - for operation timeouts
 */
export class TimeoutError extends AppError {
  public readonly timeoutMs?: number;

  constructor(message: string = 'Operation timed out', timeoutMs?: number, context?: Record<string, unknown>) {
    super(message, 'TIMEOUT_ERROR', { timeoutMs, ...context });
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Bar store query failure (network, server, malformed response)
 */
export class StoreQueryError extends AppError {
  public readonly storeName: string;

  constructor(message: string, storeName: string, context?: Record<string, unknown>) {
    super(message, 'STORE_QUERY_FAILURE', { storeName, ...context });
    this.storeName = storeName;
  }
}

/**
 * Check if error is a retryable error
 */
export function isRetryableError(error: Error): boolean {
  return error instanceof StoreQueryError || error instanceof TimeoutError;
}
