import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['shared/src/**/*.test.ts', 'loader/src/**/*.test.ts', 'tests/**/*.test.ts'],
    testTimeout: 10000,
  },
});
