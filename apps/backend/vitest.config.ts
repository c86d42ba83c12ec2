import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 20_000,
    hookTimeout: 20_000,
    isolate: true,
    // Keep it deterministic on self-hosted runners where CPU contention can happen.
    pool: 'threads',
    poolOptions: {
      threads: { singleThread: true },
    },
  },
});
