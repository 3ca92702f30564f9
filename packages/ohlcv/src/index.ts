/**
 * @candlefold/ohlcv - Bar reconstruction
 *
 * Pure transformations over immutable bar series: resampling, as-of
 * alignment, integrity and coverage checks. No I/O.
 */

export * from './resample.js';
export * from './align.js';
export * from './integrity/bar-integrity.js';
export * from './coverage/validator.js';
