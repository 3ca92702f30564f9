/**
 * histdata.com ASCII 1-minute bar files
 *
 * Rows are `;`-separated: a datetime (one or two columns) followed by
 * open, high, low, close, volume. Accepted datetime layouts:
 *   20230102 170100        (yyyyMMdd HHmmss)
 *   2023.01.02 17:01       (yyyy.MM.dd HH:mm, also split over two columns)
 *   20230102170100         (yyyyMMddHHmmss)
 */

import { readFile } from 'fs/promises';
import { parse as parseCsv } from 'csv-parse/sync';
import { DateTime } from 'luxon';
import { z } from 'zod';
import type { Bar } from '@candlefold/core';
import { SOURCE_TIMEFRAME_SECONDS } from '@candlefold/core';
import { checkBarIntegrity } from '@candlefold/ohlcv';
import { ValidationError } from '@candlefold/utils';
import { logger } from '../logger.js';

const csvRowsSchema = z.array(
  z.object({
    record: z.array(z.string()),
    info: z.object({ lines: z.number().int() }),
  })
);

export const HISTDATA_DATETIME_FORMATS = ['yyyyMMdd HHmmss', 'yyyy.MM.dd HH:mm', 'yyyyMMddHHmmss'] as const;

export interface HistdataParseOptions {
  /** Zone the file's wall-clock times are in, default 'utc' */
  zone?: string;
}

export interface SkippedRow {
  line: number;
  reason: string;
}

export interface HistdataParseResult {
  bars: Bar[];
  skipped: SkippedRow[];
}

function parseDateTime(text: string, zone: string): DateTime | null {
  for (const format of HISTDATA_DATETIME_FORMATS) {
    const parsed = DateTime.fromFormat(text, format, { zone });
    if (parsed.isValid) {
      return parsed;
    }
  }
  return null;
}

/**
 * Locate the datetime of a row and the column its prices start at
 */
function parseRowTime(columns: string[], zone: string): { time: DateTime; pricesAt: number } | null {
  const first = columns[0]?.trim() ?? '';
  const single = parseDateTime(first, zone);
  if (single) {
    return { time: single, pricesAt: 1 };
  }
  const second = columns[1]?.trim();
  if (second !== undefined) {
    const combined = parseDateTime(`${first} ${second}`, zone);
    if (combined) {
      return { time: combined, pricesAt: 2 };
    }
  }
  return null;
}

/**
 * Parse histdata CSV text into sorted 1-minute bars.
 * Rows that cannot be read are reported in `skipped`; a later row for the
 * same minute replaces an earlier one.
 */
export function parseHistdataCsv(
  content: string,
  symbol: string,
  options: HistdataParseOptions = {}
): HistdataParseResult {
  if (symbol.trim() === '') {
    throw new ValidationError('Symbol is required to parse histdata CSV');
  }
  const zone = options.zone ?? 'utc';
  if (!DateTime.now().setZone(zone).isValid) {
    throw new ValidationError(`Unknown time zone: ${zone}`, { zone });
  }

  let parsed: unknown;
  try {
    parsed = parseCsv(content, {
      delimiter: ';',
      relax_column_count: true,
      skip_empty_lines: true,
      info: true,
    });
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Unreadable histdata CSV: ${message}`, { symbol });
  }
  const rows = csvRowsSchema.parse(parsed);

  const byStart = new Map<number, Bar>();
  const skipped: SkippedRow[] = [];

  for (const { record: columns, info } of rows) {
    const line = info.lines;
    const located = parseRowTime(columns, zone);
    if (!located) {
      skipped.push({ line, reason: 'unrecognised datetime' });
      continue;
    }

    const priceColumns = columns.slice(located.pricesAt, located.pricesAt + 5);
    if (priceColumns.length < 5) {
      skipped.push({ line, reason: `expected 5 value columns, got ${priceColumns.length}` });
      continue;
    }
    const [open, high, low, close, volume] = priceColumns.map((value) =>
      value.trim() === '' ? Number.NaN : Number(value)
    );
    if (
      open === undefined ||
      high === undefined ||
      low === undefined ||
      close === undefined ||
      volume === undefined
    ) {
      skipped.push({ line, reason: 'missing value columns' });
      continue;
    }

    const bar: Bar = {
      symbol,
      timeframe: SOURCE_TIMEFRAME_SECONDS,
      periodStart: Math.floor(located.time.toSeconds()),
      open,
      high,
      low,
      close,
      volume,
    };
    const problems = checkBarIntegrity(bar);
    if (problems.length > 0) {
      skipped.push({ line, reason: problems.join('; ') });
      continue;
    }
    byStart.set(bar.periodStart, bar);
  }

  const bars = [...byStart.values()].sort((a, b) => a.periodStart - b.periodStart);
  if (skipped.length > 0) {
    logger.warn('Skipped unreadable histdata rows', {
      symbol,
      skipped: skipped.length,
      firstSkipped: skipped[0],
    });
  }
  return { bars, skipped };
}

/**
 * Read and parse one histdata file
 */
export async function loadHistdataFile(
  filePath: string,
  symbol: string,
  options: HistdataParseOptions = {}
): Promise<HistdataParseResult> {
  const content = await readFile(filePath, 'utf8');
  const result = parseHistdataCsv(content, symbol, options);
  logger.info('Loaded histdata file', {
    symbol,
    filePath,
    bars: result.bars.length,
    skipped: result.skipped.length,
  });
  return result;
}
