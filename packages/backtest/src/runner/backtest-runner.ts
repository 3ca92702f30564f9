/**
 * Backtest Runner
 * ===============
 * Drives a trainable unit through planned folds.
 *
 * - isolated:    fresh unit per fold, up to maxParallelFolds folds at a time,
 *                each batch joined before the next starts
 * - incremental: one unit carried across folds, strictly in fold order; a
 *                fold that times out is failed once its abandoned work settles
 *
 * A fold that errors, times out or returns unusable predictions is recorded
 * as failed and the run goes on. LeakageViolationError ends the run.
 */

import type {
  FoldContext,
  FoldOutcome,
  FoldSpec,
  PredictionRecord,
  TrainableUnit,
  TrainableUnitFactory,
} from '@candlefold/core';
import {
  AppError,
  FoldExecutionError,
  LeakageViolationError,
  TimeoutError,
  ValidationError,
} from '@candlefold/utils';
import { logger } from '../logger.js';
import {
  assertVectorIsCausal,
  labelVectors,
  selectEvaluationItems,
  selectTrainingSamples,
  type FoldDataset,
  type LabelledVector,
} from './fold-dataset.js';

export type FoldExecution<THandle = unknown> =
  | {
      mode: 'isolated';
      createUnit: TrainableUnitFactory<THandle>;
      /** Default 1 */
      maxParallelFolds?: number;
    }
  | {
      mode: 'incremental';
      unit: TrainableUnit<THandle>;
    };

export interface RunFoldsOptions<THandle = unknown> {
  execution: FoldExecution<THandle>;
  /** Abort and fail a fold that takes longer */
  foldTimeoutMs?: number;
  runId?: string;
}

export interface RunFoldsResult {
  /** One per fold, in fold order */
  outcomes: FoldOutcome[];
  /** Predictions of completed folds, in fold order */
  predictions: PredictionRecord[];
}

/**
 * Race `promise` against a timer; on expiry abort `controller` and reject
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  controller: AbortController,
  timeoutMessage: string = 'Operation timed out'
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(timeoutMessage, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

export interface FoldRunOptions {
  timeoutMs?: number;
  runId?: string;
  /** Wait for work abandoned on timeout to settle before returning */
  settleAbandonedWork?: boolean;
}

async function fitAndPredict<THandle>(
  unit: TrainableUnit<THandle>,
  fold: FoldSpec,
  labelled: readonly LabelledVector[],
  options: FoldRunOptions
): Promise<FoldOutcome> {
  const { timeoutMs } = options;
  const samples = selectTrainingSamples(labelled, fold.trainRange);
  const evaluation = selectEvaluationItems(labelled, fold.evalRange);

  for (const sample of samples) {
    assertVectorIsCausal(sample.vector);
  }
  for (const item of evaluation) {
    assertVectorIsCausal(item.vector);
  }

  if (evaluation.length === 0) {
    logger.warn('Fold has no evaluation vectors', { foldIndex: fold.foldIndex });
    return { fold, status: 'completed', predictions: [], trainingSamples: samples.length };
  }

  const controller = new AbortController();
  const context: FoldContext = {
    foldIndex: fold.foldIndex,
    trainRange: fold.trainRange,
    evalRange: fold.evalRange,
    signal: controller.signal,
  };

  const work = async (): Promise<readonly number[]> => {
    const handle = await unit.fit(samples, context);
    controller.signal.throwIfAborted();
    return unit.predict(
      handle,
      evaluation.map((item) => item.vector),
      context
    );
  };

  const pending = work();
  let predicted: readonly number[];
  if (timeoutMs === undefined) {
    predicted = await pending;
  } else {
    try {
      predicted = await withTimeout(pending, timeoutMs, controller, `Fold ${fold.foldIndex} exceeded ${timeoutMs}ms`);
    } catch (error: unknown) {
      if (options.settleAbandonedWork && controller.signal.aborted) {
        // the unit is shared with the next fold
        await Promise.allSettled([pending]);
      }
      throw error;
    }
  }

  if (predicted.length !== evaluation.length) {
    throw new FoldExecutionError(
      `Unit returned ${predicted.length} predictions for ${evaluation.length} vectors`,
      fold.foldIndex
    );
  }

  const predictions = evaluation.map((item, i): PredictionRecord => {
    const value = predicted[i];
    if (!Number.isFinite(value)) {
      throw new FoldExecutionError(`Prediction ${i} is not a finite number (${value})`, fold.foldIndex, {
        timestamp: item.vector.referenceTimestamp,
      });
    }
    return {
      foldIndex: fold.foldIndex,
      timestamp: item.vector.referenceTimestamp,
      targetTimestamp: item.targetTimestamp,
      predicted: value,
      actual: item.target,
      previousActual: item.previousActual,
    };
  });

  return { fold, status: 'completed', predictions, trainingSamples: samples.length };
}

/**
 * Run one fold; anything but a leakage violation becomes a failed outcome
 */
export async function executeFold<THandle>(
  getUnit: () => TrainableUnit<THandle>,
  fold: FoldSpec,
  labelled: readonly LabelledVector[],
  options: FoldRunOptions = {}
): Promise<FoldOutcome> {
  const foldLogger = logger.child({ runId: options.runId, foldIndex: fold.foldIndex });
  const startedAt = Date.now();
  let unitName: string | undefined;

  try {
    const unit = getUnit();
    unitName = unit.name;
    const outcome = await fitAndPredict(unit, fold, labelled, options);
    foldLogger.debug('Fold completed', {
      unit: unitName,
      trainingSamples: outcome.trainingSamples,
      predictions: outcome.predictions.length,
      durationMs: Date.now() - startedAt,
    });
    return outcome;
  } catch (error: unknown) {
    if (error instanceof LeakageViolationError) {
      foldLogger.error('Leakage detected, aborting run', error);
      throw error;
    }

    const failure =
      error instanceof AppError
        ? error
        : new FoldExecutionError(error instanceof Error ? error.message : String(error), fold.foldIndex);

    foldLogger.warn('Fold failed', {
      unit: unitName,
      code: failure.code,
      error: failure.message,
      durationMs: Date.now() - startedAt,
    });

    return {
      fold,
      status: 'failed',
      predictions: [],
      trainingSamples: 0,
      failure: { code: failure.code, message: failure.message },
    };
  }
}

/**
 * Execute every fold against the dataset
 */
export async function runFolds<THandle>(
  folds: readonly FoldSpec[],
  dataset: FoldDataset,
  options: RunFoldsOptions<THandle>
): Promise<RunFoldsResult> {
  const { execution, foldTimeoutMs, runId } = options;
  if (foldTimeoutMs !== undefined && (!Number.isFinite(foldTimeoutMs) || foldTimeoutMs <= 0)) {
    throw new ValidationError(`foldTimeoutMs must be positive, got ${foldTimeoutMs}`);
  }

  const labelled = labelVectors(dataset);
  const outcomes: FoldOutcome[] = [];

  logger.info('Running folds', {
    runId,
    folds: folds.length,
    mode: execution.mode,
    labelledVectors: labelled.length,
  });

  if (execution.mode === 'incremental') {
    for (const fold of folds) {
      outcomes.push(
        await executeFold(() => execution.unit, fold, labelled, {
          timeoutMs: foldTimeoutMs,
          runId,
          settleAbandonedWork: true,
        })
      );
    }
  } else {
    const maxParallelFolds = execution.maxParallelFolds ?? 1;
    if (!Number.isInteger(maxParallelFolds) || maxParallelFolds < 1) {
      throw new ValidationError(`maxParallelFolds must be an integer >= 1, got ${maxParallelFolds}`);
    }

    for (let i = 0; i < folds.length; i += maxParallelFolds) {
      const batch = folds.slice(i, i + maxParallelFolds);
      const batchOutcomes = await Promise.all(
        batch.map((fold) => executeFold(execution.createUnit, fold, labelled, { timeoutMs: foldTimeoutMs, runId }))
      );
      outcomes.push(...batchOutcomes);
    }
  }

  outcomes.sort((a, b) => a.fold.foldIndex - b.fold.foldIndex);
  const predictions = outcomes.flatMap((outcome) => outcome.predictions);
  const failed = outcomes.filter((outcome) => outcome.status === 'failed').length;

  logger.info('Folds finished', {
    runId,
    completed: outcomes.length - failed,
    failed,
    predictions: predictions.length,
  });

  return { outcomes, predictions };
}
