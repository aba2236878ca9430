import { fileURLToPath } from 'node:url';
import path from 'node:path';

import { defineConfig } from 'vitest/config';

const repoRoot = fileURLToPath(new URL('.', import.meta.url));

/**
 * Vitest runs against TypeScript source, not built `dist/` artifacts.
 *
 * Workspace imports are aliased back to their source entrypoints so tests do
 * not depend on how npm linked the packages.
 */
export default defineConfig({
  resolve: {
    alias: {
      '@aurora-mcp/core': path.join(repoRoot, 'packages/core/src/index.ts'),
      '@aurora-mcp/geo-providers': path.join(repoRoot, 'packages/geo-providers/src/index.ts'),
      '@aurora-mcp/server': path.join(repoRoot, 'packages/server/src/index.ts'),
    },
  },
  test: {
    globals: true,
    include: ['packages/**/src/**/*.test.ts'],
  },
});
