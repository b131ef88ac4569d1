import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'db',
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['dist', 'node_modules'],
    testTimeout: 2_000,
    hookTimeout: 2_000
  }
});
