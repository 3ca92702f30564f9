/**
 * @candlefold/backtest - Walk-forward evaluation
 *
 * Fold planning, fold execution against a trainable unit, forecast metrics
 * and the end-to-end pipeline.
 */

export { logger } from './logger.js';
export * from './folds/fold-planner.js';
export * from './runner/fold-dataset.js';
export * from './runner/backtest-runner.js';
export * from './metrics/forecast-metrics.js';
export * from './models/baselines.js';
export * from './pipeline/run-walk-forward.js';
export * from './report/report-writer.js';
