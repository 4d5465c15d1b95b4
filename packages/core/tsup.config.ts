import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/types-entry.ts', 'src/errors.ts', 'src/utils/index.ts', 'src/testing/index.ts'],
  external: ['jsdom', 'playwright-core'],
  format: ['esm'],
  dts: true,
  clean: true,
  sourcemap: true,
  splitting: false,
  platform: 'node',
  target: 'es2022',
});
