import { z } from 'zod';
import { outputFormatSchema, storeSourceShape } from './shared.js';

export const resampleSchema = z.object({
  symbol: z.string().min(1),
  from: z.string().min(1),
  to: z.string().min(1),
  timeframe: z.string().min(1),
  allowPartial: z.boolean().default(false),
  ...storeSourceShape,
  format: z.enum(['json', 'csv']).default('csv'),
});

export type ResampleArgs = z.infer<typeof resampleSchema>;

export const coverageSchema = z.object({
  symbol: z.string().min(1),
  from: z.string().min(1),
  to: z.string().min(1),
  ...storeSourceShape,
  format: outputFormatSchema,
});

export type CoverageArgs = z.infer<typeof coverageSchema>;
