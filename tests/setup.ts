/**
 * Root test setup file
 *
 * Runs before every test file. Keeps winston off the file system and quiet
 * unless a test raises the level itself.
 */

import { vi } from 'vitest';

process.env.LOG_FILE = 'false';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';

global.console = {
  ...console,
  log: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
};
