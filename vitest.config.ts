import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

// Workspace packages export built JavaScript at runtime; tests run the sources
const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@request-guard/contracts': source('./agents/contracts/index.ts'),
      '@request-guard/lib': source('./agents/lib/index.ts'),
    },
  },
  test: {
    include: ['agents/**/tests/**/*.test.ts'],
    environment: 'node',
  },
});
