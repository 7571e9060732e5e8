import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // Socket suites share timing-sensitive simulation loops
    fileParallelism: false,
    testTimeout: 10_000,
  },
});
