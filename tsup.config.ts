import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  clean: true,
  sourcemap: true,
  target: 'es2022',
  outDir: 'dist',
  splitting: false,
  external: [
    // Dependencies stay external for the CLI
    'chalk',
    'commander',
    'fast-xml-parser',
    'zod'
  ]
});
