import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'threads',
    include: ['packages/*/src/**/*.test.ts', 'app/**/*.test.ts'],
  },
  resolve: {
    alias: {
      // Allow the example app to import the workspace package by name during tests
      '@store-actor/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
});
