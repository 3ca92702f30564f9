/**
 * Bar Store Port
 *
 * Boundary to the external store of 1-minute bars. Adapters (ClickHouse,
 * Prometheus, CSV files, memory) live in @candlefold/storage.
 */

import type { Bar } from '../types.js';

export interface BarStorePort {
  /** Short name used in logs and StoreQueryError */
  readonly name: string;

  /**
   * Return the 1-minute bars of `symbol` with start <= periodStart < end,
   * sorted by periodStart, without duplicates. Missing minutes are omitted.
   */
  query(symbol: string, start: number, end: number): Promise<Bar[]>;

  /** Release connections; stores without any leave it out */
  close?(): Promise<void>;
}
