import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Real-repository tests spawn git many times per case
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
