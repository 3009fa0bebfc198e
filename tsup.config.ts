import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['sysdash.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  sourcemap: true,
  clean: true,
  minify: false,
  bundle: true,
  splitting: false,
  treeshake: true,
  dts: false, // The CLI entry needs no .d.ts files
  banner: {
    js: '#!/usr/bin/env node',
  },
});
