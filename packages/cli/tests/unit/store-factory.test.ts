import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { InMemoryBarStore, PrometheusBarStore } from '@candlefold/storage';
import { ValidationError } from '@candlefold/utils';
import { createBarStore } from '../../src/core/store-factory.js';
import { JAN_1 } from '../fixtures/context.js';

describe('createBarStore', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it('loads every CSV file into one in-memory store', async () => {
    dir = await mkdtemp(join(tmpdir(), 'store-factory-'));
    const first = join(dir, 'part1.csv');
    const second = join(dir, 'part2.csv');
    await writeFile(first, '20240101 000000;1.1;1.2;1.0;1.15;1\n');
    await writeFile(second, '20240101 000100;1.15;1.25;1.1;1.2;2\n');

    const store = await createBarStore({ store: 'csv', symbol: 'EURUSD', csv: [first, second], csvZone: 'utc' });

    expect(store).toBeInstanceOf(InMemoryBarStore);
    const bars = await store.query('EURUSD', JAN_1, JAN_1 + 120);
    expect(bars.map((bar) => [bar.periodStart - JAN_1, bar.close])).toEqual([
      [0, 1.15],
      [60, 1.2],
    ]);
  });

  it('requires files for the csv store', async () => {
    await expect(createBarStore({ store: 'csv', symbol: 'EURUSD', csv: [], csvZone: 'utc' })).rejects.toThrow(
      ValidationError
    );
  });

  it('builds a Prometheus store', async () => {
    const store = await createBarStore({ store: 'prometheus', symbol: 'EURUSD', csv: [], csvZone: 'utc' });

    expect(store).toBeInstanceOf(PrometheusBarStore);
  });
});
