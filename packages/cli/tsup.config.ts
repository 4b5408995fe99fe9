import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  splitting: false,
  sourcemap: false,
  dts: false,
  // Bundle the workspace core into the output
  noExternal: ['@clausecheck/core'],
  // Don't bundle npm dependencies; they resolve from node_modules
  external: [
    'chalk',
    'commander',
    'eventemitter3',
    'ora',
    'yaml',
    'zod',
  ],
});
