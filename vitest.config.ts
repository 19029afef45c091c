import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    root: import.meta.dirname,
    include: ['packages/*/src/**/*.test.ts', 'tests/integration/*.test.ts'],
    testTimeout: 15_000,
    pool: 'forks',
  },
});
