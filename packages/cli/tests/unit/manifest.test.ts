import { describe, it, expect } from 'vitest';
import { readFile } from 'fs/promises';
import { z } from 'zod';

const manifestSchema = z.object({
  bin: z.unknown().optional(),
  scripts: z.record(z.string()),
});

describe('package manifest', () => {
  it('starts the CLI from its TypeScript entry through tsx', async () => {
    const raw: unknown = JSON.parse(await readFile(new URL('../../../../package.json', import.meta.url), 'utf8'));
    const manifest = manifestSchema.parse(raw);

    expect(manifest.bin).toBeUndefined();
    expect(manifest.scripts.cli).toBe('tsx packages/cli/src/bin/candlefold.ts');
  });
});
