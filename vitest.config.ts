import { defineConfig } from 'vitest/config';

process.env.NODE_NO_WARNINGS ??= '1';

export default defineConfig({
  test: {
    globals: true,
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30_000,
    hookTimeout: 30_000,
    pool: 'forks'
  }
});
