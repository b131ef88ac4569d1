import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'engine',
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['dist', 'node_modules'],
    testTimeout: 1_000,
    hookTimeout: 1_000
  }
});
