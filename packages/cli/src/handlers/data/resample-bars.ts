/**
 * Resample handler - store bars to one higher timeframe
 */

import type { Bar } from '@candlefold/core';
import { formatInstant, parseInstant, parseTimeframe } from '@candlefold/core';
import { resampleBars } from '@candlefold/ohlcv';
import { ValidationError } from '@candlefold/utils';
import type { ResampleArgs } from '../../command-defs/data.js';
import type { CommandContext } from '../../core/command-context.js';

export async function resampleHandler(args: ResampleArgs, ctx: CommandContext): Promise<Bar[]> {
  const timeframe = parseTimeframe(args.timeframe);
  const start = parseInstant(args.from);
  const end = parseInstant(args.to);
  if (end <= start) {
    throw new ValidationError('--to must be after --from', { from: args.from, to: args.to });
  }

  const store = await ctx.services.barStore({
    store: args.store,
    symbol: args.symbol,
    csv: args.csv,
    csvZone: args.csvZone,
  });
  const source = await store.query(args.symbol, start, end);
  return resampleBars(source, timeframe, { asOf: end, allowPartial: args.allowPartial });
}

export const BAR_CSV_HEADER = 'time,open,high,low,close,volume,partial';

export function formatBarsCsv(bars: readonly Bar[]): string {
  const rows = bars.map((bar) =>
    [
      formatInstant(bar.periodStart),
      bar.open,
      bar.high,
      bar.low,
      bar.close,
      bar.volume,
      bar.partial ? 'true' : 'false',
    ].join(',')
  );
  return [BAR_CSV_HEADER, ...rows].join('\n');
}
