import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (Try, Either, Future, queues, errors)
    index: 'src/index.ts',

    // =========================================================================
    // Tools
    // =========================================================================
    testing: 'src/testing-entry.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
