import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import path from 'path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

export default defineConfig({
  test: {
    include: [
      'packages/**/tests/unit/**/*.test.ts',
      'packages/**/tests/integration/**/*.test.ts',
      'packages/**/tests/properties/**/*.test.ts',
    ],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    setupFiles: ['tests/setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      '@candlefold/utils': resolveFromRoot('packages/utils/src/index.ts'),
      '@candlefold/core': resolveFromRoot('packages/core/src/index.ts'),
      '@candlefold/ohlcv': resolveFromRoot('packages/ohlcv/src/index.ts'),
      '@candlefold/storage': resolveFromRoot('packages/storage/src/index.ts'),
      '@candlefold/backtest': resolveFromRoot('packages/backtest/src/index.ts'),
    },
  },
});
