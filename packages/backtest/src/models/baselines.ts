/**
 * Baseline trainable units
 *
 * Reference forecasters that every real model should beat. Both read the
 * close of the reference-timeframe slot of each vector.
 */

import type {
  AlignedFeatureVector,
  FoldContext,
  TrainableUnit,
  TrainingSample,
} from '@candlefold/core';
import { ValidationError } from '@candlefold/utils';

export function referenceClose(vector: AlignedFeatureVector, referenceTimeframe: number): number {
  const bar = vector.bars.get(referenceTimeframe) ?? null;
  if (bar === null) {
    throw new ValidationError(`Vector at ${vector.referenceTimestamp} has no ${referenceTimeframe}s bar`, {
      referenceTimestamp: vector.referenceTimestamp,
      referenceTimeframe,
    });
  }
  return bar.close;
}

/**
 * Predicts that the next close equals the last known close
 */
export class PersistenceUnit implements TrainableUnit<null> {
  readonly name = 'persistence';

  constructor(private readonly referenceTimeframe: number) {}

  async fit(_samples: readonly TrainingSample[], _context: FoldContext): Promise<null> {
    return null;
  }

  async predict(
    _handle: null,
    vectors: readonly AlignedFeatureVector[],
    _context: FoldContext
  ): Promise<number[]> {
    return vectors.map((vector) => referenceClose(vector, this.referenceTimeframe));
  }
}

export interface DriftHandle {
  /** Mean change from last close to target over the training samples */
  readonly drift: number;
}

/**
 * Last close plus the mean change seen in training
 */
export class DriftUnit implements TrainableUnit<DriftHandle> {
  readonly name = 'drift';

  constructor(private readonly referenceTimeframe: number) {}

  async fit(samples: readonly TrainingSample[], _context: FoldContext): Promise<DriftHandle> {
    if (samples.length === 0) {
      return { drift: 0 };
    }
    const total = samples.reduce(
      (sum, sample) => sum + (sample.target - referenceClose(sample.vector, this.referenceTimeframe)),
      0
    );
    return { drift: total / samples.length };
  }

  async predict(
    handle: DriftHandle,
    vectors: readonly AlignedFeatureVector[],
    _context: FoldContext
  ): Promise<number[]> {
    return vectors.map((vector) => referenceClose(vector, this.referenceTimeframe) + handle.drift);
  }
}

export const BASELINE_UNITS = ['persistence', 'drift'] as const;
export type BaselineUnitName = (typeof BASELINE_UNITS)[number];

export function isBaselineUnitName(value: string): value is BaselineUnitName {
  return BASELINE_UNITS.some((name) => name === value);
}

export function createBaselineUnit(
  name: BaselineUnitName,
  referenceTimeframe: number
): TrainableUnit {
  switch (name) {
    case 'persistence':
      return new PersistenceUnit(referenceTimeframe);
    case 'drift':
      return new DriftUnit(referenceTimeframe);
  }
}
