/**
 * Walk-forward pipeline
 *
 * store -> resample -> align -> plan folds -> run folds -> metrics, driven by
 * one run configuration. The run id is a hash of the validated configuration
 * and the unit name, so the same run always gets the same id.
 */

import { createHash } from 'crypto';
import type {
  BarStorePort,
  FoldFailure,
  FoldStatus,
  MetricResult,
  PredictionRecord,
  ResolvedRunConfig,
  RunConfig,
  TimeRange,
  TrainableUnit,
} from '@candlefold/core';
import { parseRunConfig, resolveRunConfig, SOURCE_TIMEFRAME_SECONDS } from '@candlefold/core';
import {
  alignTimeframes,
  dropIncompleteLeading,
  getCoverageStatus,
  referenceClock,
  resampleMany,
  validateCoverage,
  type CoverageMetrics,
} from '@candlefold/ohlcv';
import { RetryingBarStore } from '@candlefold/storage';
import type { StoreRetryConfig } from '@candlefold/utils';
import { logger } from '../logger.js';
import { planFolds } from '../folds/fold-planner.js';
import { runFolds, type FoldExecution } from '../runner/backtest-runner.js';
import { computeMetrics } from '../metrics/forecast-metrics.js';

/**
 * Builds the unit a fold trains; called once per fold in isolated mode and
 * once per run in incremental mode
 */
export type UnitProvider = (config: ResolvedRunConfig) => TrainableUnit;

export interface WalkForwardDeps {
  store: BarStorePort;
  createUnit: UnitProvider;
  /** Backoff for store queries; defaults come from the environment */
  retry?: StoreRetryConfig;
}

export interface FoldSummary {
  foldIndex: number;
  trainRange: TimeRange;
  evalRange: TimeRange;
  status: FoldStatus;
  trainingSamples: number;
  predictionCount: number;
  failure?: FoldFailure;
}

export interface WalkForwardArtifact {
  runId: string;
  symbol: string;
  unit: string;
  config: RunConfig;
  referenceTimeframe: number;
  folds: FoldSummary[];
  predictions: PredictionRecord[];
  metrics: MetricResult[];
  coverage: CoverageMetrics & { status: 'good' | 'partial' | 'poor' };
}

export function computeRunId(config: RunConfig, unitName: string): string {
  return createHash('sha256')
    .update(JSON.stringify({ config, unit: unitName }))
    .digest('hex')
    .slice(0, 16);
}

/**
 * Run one walk-forward evaluation
 *
 * @param input - run configuration, validated here
 */
export async function runWalkForward(input: unknown, deps: WalkForwardDeps): Promise<WalkForwardArtifact> {
  const config = parseRunConfig(input);
  const resolved = resolveRunConfig(config);
  const referenceTimeframe = resolved.timeframes[0];

  const firstUnit = deps.createUnit(resolved);
  const runId = computeRunId(config, firstUnit.name);
  const runLogger = logger.child({ runId, symbol: resolved.symbol });

  runLogger.info('Starting walk-forward run', {
    unit: firstUnit.name,
    timeframes: resolved.timeframes,
    foldPolicy: resolved.foldPolicy,
    foldExecution: resolved.foldExecution,
  });

  const store = new RetryingBarStore(deps.store, deps.retry);
  const sourceBars = await store.query(resolved.symbol, resolved.range.start, resolved.range.end);

  const coverage = validateCoverage(sourceBars, SOURCE_TIMEFRAME_SECONDS, resolved.range);
  const coverageStatus = getCoverageStatus(coverage.coveragePercent);
  if (coverageStatus !== 'good') {
    runLogger.warn('Source data has gaps', {
      coveragePercent: coverage.coveragePercent,
      gaps: coverage.gaps.length,
    });
  }

  const series = resampleMany(sourceBars, resolved.timeframes, {
    asOf: resolved.range.end,
    allowPartial: resolved.allowPartialBars,
  });
  const referenceBars = series.get(referenceTimeframe) ?? [];
  const vectors = dropIncompleteLeading(alignTimeframes(referenceClock(referenceBars), series));
  if (vectors.length === 0) {
    runLogger.warn('No reference time has a closed bar for every timeframe');
  }

  const folds = planFolds({
    range: resolved.range,
    policy: resolved.foldPolicy,
    trainWindow: resolved.trainWindow,
    evalWindow: resolved.evalWindow,
    step: resolved.step,
    embargo: resolved.embargo,
  });

  let unitsHandedOut = 0;
  const execution: FoldExecution =
    resolved.foldExecution === 'incremental'
      ? { mode: 'incremental', unit: firstUnit }
      : {
          mode: 'isolated',
          maxParallelFolds: resolved.maxParallelFolds,
          // the unit built for naming the run serves the first fold
          createUnit: () => (unitsHandedOut++ === 0 ? firstUnit : deps.createUnit(resolved)),
        };

  const { outcomes, predictions } = await runFolds(
    folds,
    { referenceTimeframe, vectors, referenceBars, horizon: resolved.horizon },
    { execution, foldTimeoutMs: resolved.foldTimeoutMs, runId }
  );
  const metrics = computeMetrics(outcomes);

  runLogger.info('Walk-forward run finished', {
    folds: outcomes.length,
    failed: outcomes.filter((outcome) => outcome.status === 'failed').length,
    predictions: predictions.length,
  });

  return {
    runId,
    symbol: resolved.symbol,
    unit: firstUnit.name,
    config,
    referenceTimeframe,
    folds: outcomes.map((outcome) => ({
      foldIndex: outcome.fold.foldIndex,
      trainRange: outcome.fold.trainRange,
      evalRange: outcome.fold.evalRange,
      status: outcome.status,
      trainingSamples: outcome.trainingSamples,
      predictionCount: outcome.predictions.length,
      ...(outcome.failure ? { failure: outcome.failure } : {}),
    })),
    predictions,
    metrics,
    coverage: { ...coverage, status: coverageStatus },
  };
}
