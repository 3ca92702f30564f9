/**
 * Reporter - persist and render walk-forward results
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { formatDuration, formatInstant } from '@candlefold/core';
import { logger } from '../logger.js';
import { METRIC_NAMES, summarizeMetrics } from '../metrics/forecast-metrics.js';
import type { WalkForwardArtifact } from '../pipeline/run-walk-forward.js';

/**
 * Write the artifact as pretty-printed JSON, creating parent directories
 */
export async function writeReport(artifact: WalkForwardArtifact, outputPath: string): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, JSON.stringify(artifact, null, 2) + '\n', 'utf8');
  logger.info('Report written', {
    runId: artifact.runId,
    outputPath,
    predictions: artifact.predictions.length,
  });
}

function formatValue(value: number | null): string {
  return value === null ? 'n/a' : value.toFixed(6);
}

/**
 * Plain-text table of metrics, one row per fold and one for the aggregate
 */
export function formatMetricsTable(artifact: WalkForwardArtifact): string {
  const rows = summarizeMetrics(artifact.metrics);
  const header = ['scope'.padEnd(10), ...METRIC_NAMES.map((name) => name.padStart(22))].join('');
  const lines = rows.map((row) =>
    [
      String(row.scope).padEnd(10),
      ...METRIC_NAMES.map((name) => formatValue(row[name]).padStart(22)),
    ].join('')
  );

  const failed = artifact.folds.filter((fold) => fold.status === 'failed');
  const failures = failed.map(
    (fold) => `fold ${fold.foldIndex} failed (${fold.failure?.code ?? 'UNKNOWN'}): ${fold.failure?.message ?? ''}`
  );

  return [
    `run ${artifact.runId}  ${artifact.symbol}  unit=${artifact.unit}  reference=${formatDuration(artifact.referenceTimeframe)}`,
    `range ${artifact.config.range.start} -> ${artifact.config.range.end}  folds=${artifact.folds.length}  predictions=${artifact.predictions.length}`,
    `coverage ${artifact.coverage.coveragePercent.toFixed(2)}% (${artifact.coverage.status})`,
    '',
    header,
    ...lines,
    ...(failures.length > 0 ? ['', ...failures] : []),
  ].join('\n');
}

/**
 * First and last evaluation instant of a run, for log lines
 */
export function describeEvaluationSpan(artifact: WalkForwardArtifact): string {
  const first = artifact.folds[0];
  const last = artifact.folds[artifact.folds.length - 1];
  if (!first || !last) {
    return 'no folds';
  }
  return `${formatInstant(first.evalRange.start)} -> ${formatInstant(last.evalRange.end)}`;
}
