import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'core',
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    setupFiles: ['../../test/setup.ts'],
    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      GRAPHSMITH_LOG_LEVEL: 'silent',
    },
    // Configuration for property-based testing with fast-check
    testTimeout: 10000,
    clearMocks: true,
    restoreMocks: true,
  },
});
