import { fileURLToPath } from 'node:url';
import path from 'node:path';

import { defineConfig } from 'vitest/config';

const repoRoot = fileURLToPath(new URL('.', import.meta.url));

/**
 * Vitest runs against TypeScript source, not built `dist/` artifacts.
 *
 * Workspace imports are aliased back to their source entrypoints; the more
 * specific subpaths come first so they win over the package roots.
 */
export default defineConfig({
  resolve: {
    alias: [
      { find: '@accessaudit/core/types', replacement: path.join(repoRoot, 'packages/core/src/types-entry.ts') },
      { find: '@accessaudit/core/errors', replacement: path.join(repoRoot, 'packages/core/src/errors.ts') },
      { find: '@accessaudit/core/utils', replacement: path.join(repoRoot, 'packages/core/src/utils/index.ts') },
      { find: '@accessaudit/core/testing', replacement: path.join(repoRoot, 'packages/core/src/testing/index.ts') },
      { find: '@accessaudit/core', replacement: path.join(repoRoot, 'packages/core/src/index.ts') },
      { find: '@accessaudit/rules', replacement: path.join(repoRoot, 'packages/rules/src/index.ts') },
      { find: '@accessaudit/server', replacement: path.join(repoRoot, 'packages/server/src/index.ts') },
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/src/**/*.test.ts'],
    testTimeout: 20_000,
  },
});
