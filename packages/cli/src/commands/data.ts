/**
 * Data Commands - resample and coverage
 */

import type { Command } from 'commander';
import { coverageSchema, resampleSchema } from '../command-defs/data.js';
import type { CommandContext } from '../core/command-context.js';
import { defineCommand } from '../core/defineCommand.js';
import { coverageHandler, formatCoverageTable } from '../handlers/data/coverage-report.js';
import { formatBarsCsv, resampleHandler } from '../handlers/data/resample-bars.js';
import { addStoreOptions } from './store-options.js';

export function registerDataCommands(program: Command, getContext: () => CommandContext): void {
  const resampleCmd = program
    .command('resample')
    .description('Rebuild higher-timeframe bars from the 1-minute store')
    .requiredOption('--symbol <symbol>', 'Symbol, e.g. EURUSD')
    .requiredOption('--from <iso>', 'Range start (ISO 8601, UTC when no offset)')
    .requiredOption('--to <iso>', 'Range end, also the resample cutoff')
    .requiredOption('--timeframe <label>', 'Target timeframe, e.g. 15m, 4h, 1d')
    .option('--allow-partial', 'Keep the trailing unfinished bar, flagged partial')
    .option('--format <format>', 'Output format: csv or json', 'csv');
  addStoreOptions(resampleCmd);

  defineCommand(
    resampleCmd,
    {
      schema: resampleSchema,
      handler: resampleHandler,
      render: (bars, args) => (args.format === 'json' ? JSON.stringify(bars, null, 2) : formatBarsCsv(bars)),
    },
    getContext
  );

  const coverageCmd = program
    .command('coverage')
    .description('Report gaps in the 1-minute series over a range')
    .requiredOption('--symbol <symbol>', 'Symbol, e.g. EURUSD')
    .requiredOption('--from <iso>', 'Range start')
    .requiredOption('--to <iso>', 'Range end')
    .option('--format <format>', 'Output format: table or json', 'table');
  addStoreOptions(coverageCmd);

  defineCommand(
    coverageCmd,
    {
      schema: coverageSchema,
      handler: coverageHandler,
      render: (report, args) =>
        args.format === 'json' ? JSON.stringify(report, null, 2) : formatCoverageTable(report),
    },
    getContext
  );
}
