/**
 * Run configuration schema
 *
 * One walk-forward run: which symbol, which data range, which timeframes and
 * how folds are planned and executed. Durations are labels ('90m', '3d').
 */

import { z } from 'zod';
import { ConfigurationError } from '@candlefold/utils';
import type { FoldPolicy, TimeRange } from '../types.js';
import { parseDuration, parseInstant, parseTimeframe } from '../time/timeframe.js';

const durationLabel = z
  .string()
  .trim()
  .regex(/^\d+(s|m|h|d|w)$/, 'expected a duration label such as 15m, 4h or 3d');

/**
 * Result of `parse`, or undefined when it throws
 */
function tryParse<T>(parse: (value: string) => T, value: string): T | undefined {
  try {
    return parse(value);
  } catch {
    return undefined;
  }
}

const isoInstant = z
  .string()
  .refine((value) => tryParse(parseInstant, value) !== undefined, 'expected an ISO-8601 timestamp');

export const foldPolicySchema = z.enum(['rolling', 'expanding']);
export const foldExecutionSchema = z.enum(['isolated', 'incremental']);

export const runConfigSchema = z
  .object({
    symbol: z.string().trim().min(1),
    range: z.object({
      start: isoInstant,
      end: isoInstant,
    }),
    timeframes: z.array(durationLabel).min(1),
    foldPolicy: foldPolicySchema.default('rolling'),
    trainWindow: durationLabel,
    evalWindow: durationLabel,
    step: durationLabel,
    embargo: durationLabel.default('0m'),
    horizon: z.coerce.number().int().min(1).default(1),
    allowPartialBars: z.boolean().default(false),
    maxParallelFolds: z.coerce.number().int().min(1).default(1),
    foldExecution: foldExecutionSchema.default('isolated'),
    foldTimeoutMs: z.coerce.number().int().positive().optional(),
  })
  // Refinements also run when a field check failed, so every parse here is guarded
  .superRefine((config, ctx) => {
    const start = tryParse(parseInstant, config.range.start);
    const end = tryParse(parseInstant, config.range.end);
    if (start !== undefined && end !== undefined && end <= start) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['range', 'end'],
        message: 'range.end must be after range.start',
      });
    }
    if (config.foldExecution === 'incremental' && config.maxParallelFolds !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxParallelFolds'],
        message: 'incremental fold execution runs folds sequentially; maxParallelFolds must be 1',
      });
    }
    for (const key of ['trainWindow', 'evalWindow', 'step'] as const) {
      if (tryParse(parseDuration, config[key]) === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `${key} must be positive` });
      }
    }
  });

export type RunConfigInput = z.input<typeof runConfigSchema>;
export type RunConfig = z.infer<typeof runConfigSchema>;

/**
 * Run configuration with every duration and instant in seconds
 */
export interface ResolvedRunConfig {
  symbol: string;
  range: TimeRange;
  /** Ascending, unique; the first entry is the reference timeframe */
  timeframes: number[];
  foldPolicy: FoldPolicy;
  trainWindow: number;
  evalWindow: number;
  step: number;
  embargo: number;
  horizon: number;
  allowPartialBars: boolean;
  maxParallelFolds: number;
  foldExecution: 'isolated' | 'incremental';
  foldTimeoutMs?: number;
}

/**
 * Validate an unknown document (YAML, CLI flags) as a run configuration
 */
export function parseRunConfig(input: unknown): RunConfig {
  const result = runConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid run configuration: ${issues.join('; ')}`, 'run', { issues });
  }
  return result.data;
}

export function resolveRunConfig(config: RunConfig): ResolvedRunConfig {
  const timeframes = [...new Set(config.timeframes.map((label) => parseTimeframe(label)))].sort(
    (a, b) => a - b
  );

  return {
    symbol: config.symbol,
    range: { start: parseInstant(config.range.start), end: parseInstant(config.range.end) },
    timeframes,
    foldPolicy: config.foldPolicy,
    trainWindow: parseDuration(config.trainWindow),
    evalWindow: parseDuration(config.evalWindow),
    step: parseDuration(config.step),
    embargo: parseDuration(config.embargo),
    horizon: config.horizon,
    allowPartialBars: config.allowPartialBars,
    maxParallelFolds: config.maxParallelFolds,
    foldExecution: config.foldExecution,
    foldTimeoutMs: config.foldTimeoutMs,
  };
}
