/**
 * Commander program with every command registered
 */

import { Command } from 'commander';
import { createCommandContext, type CommandContext } from './core/command-context.js';
import { registerBacktestCommands } from './commands/backtest.js';
import { registerDataCommands } from './commands/data.js';

export function createProgram(getContext: () => CommandContext = () => createCommandContext()): Command {
  const program = new Command();

  program
    .name('candlefold')
    .description('Multi-timeframe bar reconstruction and leakage-free walk-forward backtesting')
    .version('0.1.0');

  registerBacktestCommands(program, getContext);
  registerDataCommands(program, getContext);

  program.configureOutput({
    writeErr: (str) => {
      process.stderr.write(str);
    },
  });

  return program;
}
