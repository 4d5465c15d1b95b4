import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/cli.ts'],
  format: ['esm'],
  clean: true,
  sourcemap: true,
  splitting: false,
  platform: 'node',
  target: 'es2022',
  external: ['commander', 'ora', 'playwright-core', 'jsdom'],
  banner: { js: '#!/usr/bin/env node' },
});
