/**
 * Forecast Metrics
 * ================
 * Regression and directional metrics over prediction records, per completed
 * fold and across folds.
 *
 * - mae:  mean |predicted - actual|
 * - rmse: sqrt(mean (predicted - actual)^2)
 * - mape: mean |(predicted - actual) / actual| * 100, records with actual = 0
 *         skipped
 * - directional_accuracy: share of records where predicted and actual move
 *   the same way from previousActual (Math.sign, so "flat" matches "flat")
 *
 * The aggregate of a metric is the unweighted mean of its non-null fold values.
 */

import type { FoldOutcome, MetricName, MetricResult, PredictionRecord } from '@candlefold/core';

export const METRIC_NAMES: readonly MetricName[] = ['mae', 'rmse', 'mape', 'directional_accuracy'];

export type MetricValues = Record<MetricName, number | null>;

function mean(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * All metrics for one set of records; every value is null when there are none
 */
export function computeRecordMetrics(records: readonly PredictionRecord[]): MetricValues {
  const errors = records.map((record) => record.predicted - record.actual);
  const meanSquared = mean(errors.map((error) => error * error));

  const percentageErrors = records
    .filter((record) => record.actual !== 0)
    .map((record) => Math.abs((record.predicted - record.actual) / record.actual) * 100);

  const directionHits = records.map((record) =>
    Math.sign(record.predicted - record.previousActual) === Math.sign(record.actual - record.previousActual)
      ? 1
      : 0
  );

  return {
    mae: mean(errors.map(Math.abs)),
    rmse: meanSquared === null ? null : Math.sqrt(meanSquared),
    mape: mean(percentageErrors),
    directional_accuracy: mean(directionHits),
  };
}

/**
 * Per-fold results for every completed fold (ascending fold index), followed
 * by the aggregate. Failed folds contribute nothing.
 */
export function computeMetrics(outcomes: readonly FoldOutcome[]): MetricResult[] {
  const completed = outcomes
    .filter((outcome) => outcome.status === 'completed')
    .sort((a, b) => a.fold.foldIndex - b.fold.foldIndex);

  const results: MetricResult[] = [];
  const perFold: MetricValues[] = [];

  for (const outcome of completed) {
    const values = computeRecordMetrics(outcome.predictions);
    perFold.push(values);
    for (const metric of METRIC_NAMES) {
      results.push({ scope: outcome.fold.foldIndex, metric, value: values[metric] });
    }
  }

  for (const metric of METRIC_NAMES) {
    const available = perFold
      .map((values) => values[metric])
      .filter((value): value is number => value !== null);
    results.push({ scope: 'aggregate', metric, value: mean(available) });
  }

  return results;
}

export interface MetricsRow extends MetricValues {
  scope: number | 'aggregate';
}

/**
 * Pivot metric results into one row per scope, folds first
 */
export function summarizeMetrics(results: readonly MetricResult[]): MetricsRow[] {
  const rows = new Map<number | 'aggregate', MetricsRow>();

  for (const result of results) {
    const row = rows.get(result.scope) ?? {
      scope: result.scope,
      mae: null,
      rmse: null,
      mape: null,
      directional_accuracy: null,
    };
    row[result.metric] = result.value;
    rows.set(result.scope, row);
  }

  return [...rows.values()].sort((a, b) => {
    if (a.scope === 'aggregate') return b.scope === 'aggregate' ? 0 : 1;
    if (b.scope === 'aggregate') return -1;
    return a.scope - b.scope;
  });
}
