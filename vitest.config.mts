import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages_mjs/*/tests/**/*.test.mts'],
    environment: 'node',
    globals: false,
    testTimeout: 10000,
  },
});
