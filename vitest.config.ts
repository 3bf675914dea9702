import { defineConfig } from 'vitest/config';

/**
 * graphsmith - root Vitest configuration
 *
 * Every workspace package is a Vitest project; `npm test` at the root runs
 * all of them once. Property-based tests read their seed and run count from
 * the environment set below.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    // ========================================================================
    // EXECUTION ENVIRONMENT
    // ========================================================================

    environment: 'node',
    pool: 'forks',

    // ========================================================================
    // TEST DISCOVERY AND EXECUTION
    // ========================================================================

    projects: ['packages/*'],

    // No retries - surface issues immediately
    retry: 0,

    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    // ========================================================================
    // REPORTING
    // ========================================================================

    reporters: ['default'],
    silent: false,

    // ========================================================================
    // ENVIRONMENT VARIABLES
    // ========================================================================

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
