import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'rewards-api',
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: [],
    testTimeout: 5_000
  }
});
