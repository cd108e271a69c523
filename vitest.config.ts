import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    pool: 'forks',
    maxConcurrency: 1,
    testTimeout: Number(process.env.VITEST_TIMEOUT ?? 20000),
    include: ['tests/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
  },
});
