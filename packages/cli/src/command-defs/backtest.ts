import { z } from 'zod';
import { BASELINE_UNITS } from '@candlefold/backtest';
import { outputFormatSchema, storeSourceShape } from './shared.js';

/**
 * Walk-forward run schema
 *
 * The run itself is described by a YAML file; flags override single fields.
 */
export const backtestRunSchema = z.object({
  config: z.string().min(1),
  ...storeSourceShape,
  unit: z.enum(BASELINE_UNITS).default('persistence'),
  symbol: z.string().min(1).optional(),
  from: z.string().optional(),
  to: z.string().optional(),
  maxParallelFolds: z.coerce.number().int().min(1).optional(),
  out: z.string().optional(),
  format: outputFormatSchema,
});

export type BacktestRunArgs = z.infer<typeof backtestRunSchema>;
