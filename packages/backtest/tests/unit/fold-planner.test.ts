import { describe, it, expect } from 'vitest';
import { InsufficientRangeError, ValidationError } from '@candlefold/utils';
import { generateFolds, planFolds, type FoldPlanOptions } from '../../src/folds/fold-planner.js';

const base: FoldPlanOptions = {
  range: { start: 0, end: 160 },
  policy: 'rolling',
  trainWindow: 100,
  evalWindow: 20,
  step: 20,
};

describe('planFolds', () => {
  it('slides a rolling train window', () => {
    expect(planFolds(base)).toEqual([
      { foldIndex: 0, trainRange: { start: 0, end: 100 }, evalRange: { start: 100, end: 120 } },
      { foldIndex: 1, trainRange: { start: 20, end: 120 }, evalRange: { start: 120, end: 140 } },
      { foldIndex: 2, trainRange: { start: 40, end: 140 }, evalRange: { start: 140, end: 160 } },
    ]);
  });

  it('anchors an expanding train window at the range start', () => {
    const folds = planFolds({ ...base, policy: 'expanding' });

    expect(folds.map((fold) => fold.trainRange)).toEqual([
      { start: 0, end: 100 },
      { start: 0, end: 120 },
      { start: 0, end: 140 },
    ]);
    expect(folds.map((fold) => fold.evalRange.start)).toEqual([100, 120, 140]);
  });

  it('leaves an embargo between train and eval', () => {
    expect(planFolds({ ...base, embargo: 10 })).toEqual([
      { foldIndex: 0, trainRange: { start: 0, end: 100 }, evalRange: { start: 110, end: 130 } },
      { foldIndex: 1, trainRange: { start: 20, end: 120 }, evalRange: { start: 130, end: 150 } },
    ]);
  });

  it('offsets folds from the range start', () => {
    const folds = planFolds({ ...base, range: { start: 1000, end: 1130 } });

    expect(folds.map((fold) => fold.evalRange)).toEqual([
      { start: 1100, end: 1120 },
    ]);
  });

  it('returns frozen folds', () => {
    const [fold] = planFolds(base);

    expect(Object.isFrozen(fold)).toBe(true);
    expect(Object.isFrozen(fold.trainRange)).toBe(true);
  });

  it('throws InsufficientRangeError when no fold fits', () => {
    const attempt = () => planFolds({ ...base, range: { start: 0, end: 100 } });

    expect(attempt).toThrow(InsufficientRangeError);
    expect(attempt).toThrow('Range of 100s cannot hold one fold of 2m');
  });

  it.each([
    ['trainWindow', { trainWindow: 0 }],
    ['evalWindow', { evalWindow: -20 }],
    ['step', { step: 1.5 }],
    ['embargo', { embargo: -1 }],
    ['range', { range: { start: 100, end: 100 } }],
  ] as const)('rejects a bad %s', (_name, override) => {
    expect(() => planFolds({ ...base, ...override })).toThrow(ValidationError);
  });
});

describe('generateFolds', () => {
  it('validates options on the first pull', () => {
    const folds = generateFolds({ ...base, step: 0 });

    expect(() => folds.next()).toThrow('step must be a positive integer number of seconds, got 0');
  });

  it('yields folds one at a time', () => {
    const folds = generateFolds({ ...base, range: { start: 0, end: 1_000_000_000 } });

    expect(folds.next().value).toEqual(planFolds(base)[0]);
    expect(folds.next().value).toEqual(planFolds(base)[1]);
  });
});
