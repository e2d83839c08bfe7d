import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    setupFiles: ['packages/bulk-geocoder/src/__tests__/setup.ts'],
    testTimeout: 30000,
    pool: 'forks',
    globals: true,
  },
});
