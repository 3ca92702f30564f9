/**
 * Coverage handler - how complete the 1-minute series is over a range
 */

import { parseInstant, SOURCE_TIMEFRAME_SECONDS } from '@candlefold/core';
import { getCoverageStatus, validateCoverage, type CoverageMetrics } from '@candlefold/ohlcv';
import { ValidationError } from '@candlefold/utils';
import type { CoverageArgs } from '../../command-defs/data.js';
import type { CommandContext } from '../../core/command-context.js';

export interface CoverageReport extends CoverageMetrics {
  symbol: string;
  status: 'good' | 'partial' | 'poor';
}

export async function coverageHandler(args: CoverageArgs, ctx: CommandContext): Promise<CoverageReport> {
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
  const bars = await store.query(args.symbol, start, end);
  const coverage = validateCoverage(bars, SOURCE_TIMEFRAME_SECONDS, { start, end });

  return { symbol: args.symbol, ...coverage, status: getCoverageStatus(coverage.coveragePercent) };
}

export function formatCoverageTable(report: CoverageReport): string {
  const lines = [
    `${report.symbol}: ${report.actualBars}/${report.expectedBars} bars, ${report.coveragePercent.toFixed(2)}% (${report.status})`,
  ];
  for (const gap of report.gaps) {
    lines.push(`  gap ${gap.from} -> ${gap.to} (${gap.missingBars} bars)`);
  }
  return lines.join('\n');
}
