/**
 * Domain types shared by every package.
 *
 * Times are UNIX seconds (UTC). Durations, including timeframes, are whole
 * seconds. Bars are aligned to UNIX epoch 0.
 */

/**
 * OHLCV bar for one symbol over [periodStart, periodStart + timeframe)
 */
export interface Bar {
  readonly symbol: string;
  readonly timeframe: number;
  readonly periodStart: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
  /** Set on bars whose window had not fully elapsed at the resample cutoff */
  readonly partial?: boolean;
}

/**
 * Half-open interval [start, end)
 */
export interface TimeRange {
  readonly start: number;
  readonly end: number;
}

export interface ResampleWindow {
  readonly timeframe: number;
  readonly periodStart: number;
  readonly periodEnd: number;
}

/**
 * Per-timeframe view of the market as of one reference timestamp.
 * Every timeframe requested from the aligner has a slot; null means no
 * closed bar existed yet.
 */
export interface AlignedFeatureVector {
  readonly referenceTimestamp: number;
  readonly bars: ReadonlyMap<number, Bar | null>;
}

export type FoldPolicy = 'rolling' | 'expanding';

export interface FoldSpec {
  readonly foldIndex: number;
  readonly trainRange: TimeRange;
  readonly evalRange: TimeRange;
}

export interface PredictionRecord {
  readonly foldIndex: number;
  /** Reference timestamp the prediction was made at */
  readonly timestamp: number;
  /** Close time of the bar whose close is `actual` */
  readonly targetTimestamp: number;
  readonly predicted: number;
  readonly actual: number;
  /** Last close known at `timestamp` */
  readonly previousActual: number;
}

export type FoldStatus = 'completed' | 'failed';

export interface FoldFailure {
  readonly code: string;
  readonly message: string;
}

/**
 * What happened to one fold. Failed folds carry no predictions.
 */
export interface FoldOutcome {
  readonly fold: FoldSpec;
  readonly status: FoldStatus;
  readonly predictions: readonly PredictionRecord[];
  readonly trainingSamples: number;
  readonly failure?: FoldFailure;
}

export type MetricName = 'mae' | 'rmse' | 'mape' | 'directional_accuracy';

export interface MetricResult {
  readonly scope: number | 'aggregate';
  readonly metric: MetricName;
  /** null when the metric is undefined for the scope (N/A) */
  readonly value: number | null;
}

export function barPeriodEnd(bar: Bar): number {
  return bar.periodStart + bar.timeframe;
}

export function isWithinRange(timestamp: number, range: TimeRange): boolean {
  return timestamp >= range.start && timestamp < range.end;
}
