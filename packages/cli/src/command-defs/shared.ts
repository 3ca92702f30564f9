import { z } from 'zod';

export const storeKindSchema = z.enum(['clickhouse', 'prometheus', 'csv']);

/**
 * Options every command that reads bars accepts
 */
export const storeSourceShape = {
  store: storeKindSchema.default('clickhouse'),
  csv: z.array(z.string().min(1)).default([]),
  csvZone: z.string().min(1).default('utc'),
};

export const outputFormatSchema = z.enum(['json', 'table']).default('table');
