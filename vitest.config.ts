/**
 * Vitest configuration: pure unit tests, no setup or external services.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['spec/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 5000,
    reporters: ['default'],
  },
});
