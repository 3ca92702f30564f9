/**
 * Walk-forward backtest handler
 */

import {
  createBaselineUnit,
  describeEvaluationSpan,
  runWalkForward,
  writeReport,
  type WalkForwardArtifact,
} from '@candlefold/backtest';
import { ConfigurationError, loadYamlFile } from '@candlefold/utils';
import type { BacktestRunArgs } from '../../command-defs/backtest.js';
import type { CommandContext } from '../../core/command-context.js';
import { logger } from '../../logger.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Run document from the YAML file with command-line overrides applied
 */
export function buildRunDocument(document: unknown, args: BacktestRunArgs): Record<string, unknown> {
  if (!isRecord(document)) {
    throw new ConfigurationError(`Run file ${args.config} must contain a mapping`, 'config');
  }
  const range = isRecord(document.range) ? document.range : {};

  return {
    ...document,
    ...(args.symbol !== undefined ? { symbol: args.symbol } : {}),
    ...(args.maxParallelFolds !== undefined ? { maxParallelFolds: args.maxParallelFolds } : {}),
    range: {
      ...range,
      ...(args.from !== undefined ? { start: args.from } : {}),
      ...(args.to !== undefined ? { end: args.to } : {}),
    },
  };
}

export async function runBacktestHandler(
  args: BacktestRunArgs,
  ctx: CommandContext
): Promise<WalkForwardArtifact> {
  const document = buildRunDocument(loadYamlFile(args.config), args);
  const symbol = typeof document.symbol === 'string' ? document.symbol : '';

  const store = await ctx.services.barStore({
    store: args.store,
    symbol,
    csv: args.csv,
    csvZone: args.csvZone,
  });

  const artifact = await runWalkForward(document, {
    store,
    createUnit: (config) => createBaselineUnit(args.unit, config.timeframes[0]),
  });

  if (args.out) {
    await writeReport(artifact, args.out);
  }
  logger.info('Backtest finished', {
    runId: artifact.runId,
    evaluated: describeEvaluationSpan(artifact),
    out: args.out,
  });
  return artifact;
}
