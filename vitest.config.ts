import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // tree-sitter and koffi are native add-ons; keep one file at a time in a
    // forked worker so both load once per process.
    pool: 'forks',
    fileParallelism: false,
    testTimeout: 30_000,
  },
});
