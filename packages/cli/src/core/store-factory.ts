/**
 * Bar store selection for CLI commands
 */

import type { BarStorePort } from '@candlefold/core';
import {
  ClickHouseBarStore,
  InMemoryBarStore,
  loadHistdataFile,
  PrometheusBarStore,
} from '@candlefold/storage';
import { ValidationError } from '@candlefold/utils';

export type StoreKind = 'clickhouse' | 'prometheus' | 'csv';

export interface StoreSourceOptions {
  store: StoreKind;
  symbol: string;
  /** histdata files, required for the csv store */
  csv: string[];
  /** Zone of the CSV wall-clock times */
  csvZone: string;
}

export async function createBarStore(options: StoreSourceOptions): Promise<BarStorePort> {
  switch (options.store) {
    case 'clickhouse':
      return new ClickHouseBarStore();
    case 'prometheus':
      return new PrometheusBarStore();
    case 'csv': {
      if (options.csv.length === 0) {
        throw new ValidationError('--csv <file...> is required with --store csv');
      }
      const store = new InMemoryBarStore();
      for (const file of options.csv) {
        const { bars } = await loadHistdataFile(file, options.symbol, { zone: options.csvZone });
        store.add(bars);
      }
      return store;
    }
  }
}
