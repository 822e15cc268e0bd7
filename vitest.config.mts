import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    include: [
      'packages/**/__tests__/**/*.test.ts',
      'apps/**/__tests__/**/*.test.ts',
    ],

    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],

    testTimeout: 30000,
    hookTimeout: 30000,

    // Reset spies between tests
    mockReset: true,
    restoreMocks: true,
    clearMocks: true,

    watch: false,
  },
});
