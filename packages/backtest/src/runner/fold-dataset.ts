/**
 * Labelled vectors for the runner
 *
 * The label of the vector at reference time t is the close of the
 * reference-timeframe bar that closes at t + horizon * referenceTimeframe.
 * Vectors whose target bar does not exist (gap, end of data) carry no label
 * and are never trained on or scored.
 */

import type { AlignedFeatureVector, Bar, TimeRange, TrainingSample } from '@candlefold/core';
import { barPeriodEnd, isWithinRange } from '@candlefold/core';
import { assertNoLookahead } from '@candlefold/ohlcv';
import { MalformedBarError, ValidationError } from '@candlefold/utils';

export interface FoldDataset {
  readonly referenceTimeframe: number;
  readonly vectors: readonly AlignedFeatureVector[];
  /** Bars of the reference timeframe; partial bars are ignored */
  readonly referenceBars: readonly Bar[];
  /** Steps of the reference timeframe between a vector and its target, default 1 */
  readonly horizon?: number;
}

export interface LabelledVector {
  readonly vector: AlignedFeatureVector;
  readonly target: number;
  readonly targetTimestamp: number;
  /** Close of the reference bar that closed at the vector's timestamp */
  readonly previousActual: number;
}

/**
 * Attach targets to every vector that has one
 */
export function labelVectors(dataset: FoldDataset): LabelledVector[] {
  const { referenceTimeframe, vectors, referenceBars } = dataset;
  const horizon = dataset.horizon ?? 1;
  if (!Number.isInteger(horizon) || horizon < 1) {
    throw new ValidationError(`horizon must be an integer >= 1, got ${horizon}`, { horizon });
  }

  const closeByEnd = new Map<number, number>();
  for (const bar of referenceBars) {
    if (bar.timeframe !== referenceTimeframe) {
      throw new MalformedBarError(
        [`reference bar timeframe ${bar.timeframe}s differs from ${referenceTimeframe}s`],
        { periodStart: bar.periodStart }
      );
    }
    if (!bar.partial) {
      closeByEnd.set(barPeriodEnd(bar), bar.close);
    }
  }

  const labelled: LabelledVector[] = [];
  for (const vector of vectors) {
    const reference = vector.bars.get(referenceTimeframe) ?? null;
    if (reference === null) {
      continue;
    }
    const targetTimestamp = vector.referenceTimestamp + horizon * referenceTimeframe;
    const target = closeByEnd.get(targetTimestamp);
    if (target === undefined) {
      continue;
    }
    labelled.push({ vector, target, targetTimestamp, previousActual: reference.close });
  }
  return labelled;
}

/**
 * Throws LeakageViolationError if any slot closes after the vector's time
 */
export function assertVectorIsCausal(vector: AlignedFeatureVector): void {
  for (const bar of vector.bars.values()) {
    assertNoLookahead(bar, vector.referenceTimestamp);
  }
}

/**
 * Samples a fold may train on: inside the train range, with the label also
 * known by the end of it
 */
export function selectTrainingSamples(
  labelled: readonly LabelledVector[],
  trainRange: TimeRange
): TrainingSample[] {
  return labelled
    .filter(
      (item) =>
        isWithinRange(item.vector.referenceTimestamp, trainRange) && item.targetTimestamp <= trainRange.end
    )
    .map((item) => ({
      vector: item.vector,
      target: item.target,
      targetTimestamp: item.targetTimestamp,
    }));
}

export function selectEvaluationItems(
  labelled: readonly LabelledVector[],
  evalRange: TimeRange
): LabelledVector[] {
  return labelled.filter((item) => isWithinRange(item.vector.referenceTimestamp, evalRange));
}
