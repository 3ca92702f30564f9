/**
 * Trainable Unit Port
 *
 * Capability interface for any forecasting model. The backtest core never
 * inspects the handle a unit returns from fit().
 */

import type { AlignedFeatureVector, TimeRange } from '../types.js';

export interface TrainingSample {
  readonly vector: AlignedFeatureVector;
  /** Close of the target bar */
  readonly target: number;
  /** Close time of the target bar, always <= the fold's train end */
  readonly targetTimestamp: number;
}

export interface FoldContext {
  readonly foldIndex: number;
  readonly trainRange: TimeRange;
  readonly evalRange: TimeRange;
  /** Aborted when the fold times out */
  readonly signal: AbortSignal;
}

export interface TrainableUnit<THandle = unknown> {
  readonly name: string;
  fit(samples: readonly TrainingSample[], context: FoldContext): Promise<THandle>;
  /** One prediction per vector, in order */
  predict(
    handle: THandle,
    vectors: readonly AlignedFeatureVector[],
    context: FoldContext
  ): Promise<readonly number[]>;
}

export type TrainableUnitFactory<THandle = unknown> = () => TrainableUnit<THandle>;
