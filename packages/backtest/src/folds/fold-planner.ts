/**
 * Fold Planner
 *
 * Splits a data range into ordered (train, eval) window pairs and slides
 * forward by `step`:
 *
 *   rolling:   [s+i*step, s+i*step+train) -> eval
 *   expanding: [s, s+train+i*step)        -> eval
 *
 * Eval starts `embargo` seconds after train ends. Generation stops at the
 * first fold whose eval window would run past range.end.
 */

import type { FoldPolicy, FoldSpec, TimeRange } from '@candlefold/core';
import { formatDuration } from '@candlefold/core';
import { InsufficientRangeError, ValidationError } from '@candlefold/utils';
import { logger } from '../logger.js';

export interface FoldPlanOptions {
  range: TimeRange;
  policy: FoldPolicy;
  /** Seconds */
  trainWindow: number;
  evalWindow: number;
  step: number;
  /** Gap between train end and eval start, default 0 */
  embargo?: number;
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer number of seconds, got ${value}`, {
      [name]: value,
    });
  }
}

function validatePlanOptions(options: FoldPlanOptions): void {
  const { range, policy } = options;
  if (!Number.isInteger(range.start) || !Number.isInteger(range.end) || range.end <= range.start) {
    throw new ValidationError('Fold range must be a non-empty interval of whole seconds', { range });
  }
  if (policy !== 'rolling' && policy !== 'expanding') {
    throw new ValidationError(`Unknown fold policy: ${String(policy)}`, { policy });
  }
  assertPositiveInteger('trainWindow', options.trainWindow);
  assertPositiveInteger('evalWindow', options.evalWindow);
  assertPositiveInteger('step', options.step);

  const embargo = options.embargo ?? 0;
  if (!Number.isInteger(embargo) || embargo < 0) {
    throw new ValidationError(`embargo must be a non-negative integer number of seconds, got ${embargo}`, {
      embargo,
    });
  }
}

/**
 * Lazily yield folds in order. Options are validated on the first pull.
 */
export function* generateFolds(options: FoldPlanOptions): Generator<FoldSpec, void, undefined> {
  validatePlanOptions(options);

  const { range, policy, trainWindow, evalWindow, step } = options;
  const embargo = options.embargo ?? 0;

  for (let foldIndex = 0; ; foldIndex++) {
    const offset = foldIndex * step;
    const trainStart = policy === 'rolling' ? range.start + offset : range.start;
    const trainEnd = range.start + trainWindow + offset;
    const evalStart = trainEnd + embargo;
    const evalEnd = evalStart + evalWindow;

    if (evalEnd > range.end) {
      return;
    }

    yield Object.freeze({
      foldIndex,
      trainRange: Object.freeze({ start: trainStart, end: trainEnd }),
      evalRange: Object.freeze({ start: evalStart, end: evalEnd }),
    });
  }
}

/**
 * Every fold that fits in the range
 */
export function planFolds(options: FoldPlanOptions): FoldSpec[] {
  const folds = [...generateFolds(options)];

  if (folds.length === 0) {
    const needed = options.trainWindow + (options.embargo ?? 0) + options.evalWindow;
    throw new InsufficientRangeError(
      `Range of ${formatDuration(options.range.end - options.range.start)} cannot hold one fold of ${formatDuration(needed)}`,
      { range: options.range, needed }
    );
  }

  logger.info('Planned folds', {
    policy: options.policy,
    folds: folds.length,
    trainWindow: options.trainWindow,
    evalWindow: options.evalWindow,
    step: options.step,
    embargo: options.embargo ?? 0,
  });

  return folds;
}
