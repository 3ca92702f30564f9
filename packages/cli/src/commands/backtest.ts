/**
 * Backtest Commands
 */

import type { Command } from 'commander';
import { formatMetricsTable } from '@candlefold/backtest';
import { backtestRunSchema } from '../command-defs/backtest.js';
import type { CommandContext } from '../core/command-context.js';
import { defineCommand } from '../core/defineCommand.js';
import { runBacktestHandler } from '../handlers/backtest/run-backtest.js';
import { addStoreOptions } from './store-options.js';

export function registerBacktestCommands(program: Command, getContext: () => CommandContext): void {
  const cmd = program
    .command('backtest')
    .description('Walk-forward backtest of a baseline unit over reconstructed bars')
    .requiredOption('--config <path>', 'YAML run file')
    .option('--unit <name>', 'Baseline unit: persistence or drift', 'persistence')
    .option('--symbol <symbol>', 'Override the run file symbol')
    .option('--from <iso>', 'Override range.start')
    .option('--to <iso>', 'Override range.end')
    .option('--max-parallel-folds <n>', 'Override maxParallelFolds')
    .option('--out <path>', 'Write the full run artifact as JSON')
    .option('--format <format>', 'Output format: table or json', 'table');
  addStoreOptions(cmd);

  defineCommand(
    cmd,
    {
      schema: backtestRunSchema,
      handler: runBacktestHandler,
      render: (artifact, args) =>
        args.format === 'json'
          ? JSON.stringify({ runId: artifact.runId, folds: artifact.folds, metrics: artifact.metrics }, null, 2)
          : formatMetricsTable(artifact),
    },
    getContext
  );
}
