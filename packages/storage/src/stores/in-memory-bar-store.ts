import type { Bar, BarStorePort } from '@candlefold/core';
import { ValidationError } from '@candlefold/utils';

/**
 * Bar store over bars already held in memory (CSV imports, tests).
 * Bars are kept per symbol, sorted, with later duplicates replacing earlier ones.
 */
export class InMemoryBarStore implements BarStorePort {
  readonly name = 'memory';
  private readonly bySymbol = new Map<string, Bar[]>();

  constructor(bars: Iterable<Bar> = []) {
    this.add(bars);
  }

  add(bars: Iterable<Bar>): void {
    const touched = new Set<string>();
    for (const bar of bars) {
      const series = this.bySymbol.get(bar.symbol) ?? [];
      series.push(bar);
      this.bySymbol.set(bar.symbol, series);
      touched.add(bar.symbol);
    }

    for (const symbol of touched) {
      const byStart = new Map<number, Bar>();
      for (const bar of this.bySymbol.get(symbol) ?? []) {
        byStart.set(bar.periodStart, bar);
      }
      this.bySymbol.set(
        symbol,
        [...byStart.values()].sort((a, b) => a.periodStart - b.periodStart)
      );
    }
  }

  symbols(): string[] {
    return [...this.bySymbol.keys()].sort();
  }

  async query(symbol: string, start: number, end: number): Promise<Bar[]> {
    if (end < start) {
      throw new ValidationError('Query end precedes start', { symbol, start, end });
    }
    const series = this.bySymbol.get(symbol) ?? [];
    return series.filter((bar) => bar.periodStart >= start && bar.periodStart < end);
  }
}
