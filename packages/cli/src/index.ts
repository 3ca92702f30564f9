/**
 * @candlefold/cli - Command-line interface
 */

export { createProgram } from './program.js';
export * from './core/command-context.js';
export * from './core/store-factory.js';
export { defineCommand, parseCommandArgs } from './core/defineCommand.js';
export { exitCodeFor, formatError } from './core/error-handler.js';
export * from './command-defs/backtest.js';
export * from './command-defs/data.js';
export * from './handlers/backtest/run-backtest.js';
export * from './handlers/data/resample-bars.js';
export * from './handlers/data/coverage-report.js';
