import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Benchmarks should run without dev logging noise.
  define: {
    'process.env.NODE_ENV': '"production"',
  },
  test: {
    environment: 'node',
    globals: true,
    include: ['benches/**/*.bench.ts'],
    benchmark: {
      include: ['benches/**/*.bench.ts'],
    },
  },
});
