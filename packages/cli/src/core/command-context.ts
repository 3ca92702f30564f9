/**
 * Command Context - Lazy service creation
 *
 * Handlers receive services through the context so tests can swap the bar
 * store for an in-memory one.
 */

import type { BarStorePort } from '@candlefold/core';
import { createBarStore, type StoreSourceOptions } from './store-factory.js';

export interface CommandServices {
  barStore(source: StoreSourceOptions): Promise<BarStorePort>;
}

export interface CommandContext {
  services: CommandServices;
  print(text: string): void;
  /** Close every store the services handed out */
  close(): Promise<void>;
}

export function createCommandContext(overrides: Partial<CommandServices> = {}): CommandContext {
  const createStore = overrides.barStore ?? createBarStore;
  const opened: BarStorePort[] = [];

  return {
    services: {
      barStore: async (source) => {
        const store = await createStore(source);
        opened.push(store);
        return store;
      },
    },
    print: (text) => {
      process.stdout.write(text + '\n');
    },
    close: async () => {
      const stores = opened.splice(0);
      await Promise.all(stores.map((store) => store.close?.()));
    },
  };
}
