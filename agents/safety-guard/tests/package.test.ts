/**
 * @module package.test
 * @description Checks that the package manifest points Node at built output
 */

import { describe, it, expect } from 'vitest';
import { readFile } from 'fs/promises';
import { z } from 'zod';

const Manifest = z.object({
  bin: z.record(z.string()).optional(),
  exports: z.object({
    '.': z.object({ types: z.string(), default: z.string() }),
  }),
});

async function readManifest(path: string): Promise<z.infer<typeof Manifest>> {
  const text = await readFile(new URL(path, import.meta.url), 'utf-8');
  return Manifest.parse(JSON.parse(text));
}

describe('package manifest', () => {
  it('should run the bin from compiled JavaScript', async () => {
    const manifest = await readManifest('../package.json');
    expect(manifest.bin).toEqual({ 'safety-guard': './dist/bin.js' });
  });

  it.each(['../package.json', '../../contracts/package.json', '../../lib/package.json'])(
    'should give %s TypeScript types and a compiled default export',
    async (path) => {
      const entry = (await readManifest(path)).exports['.'];
      expect(entry.types).toMatch(/\.ts$/);
      expect(entry.default).toBe('./dist/index.js');
    }
  );
});
