import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: '@frozen-collections/core',
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    benchmark: {
      include: ['benchmarks/**/*.bench.ts'],
    },
  },
});
