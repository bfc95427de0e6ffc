import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    // Tests inject tokens explicitly
    env: {
      GITHUB_TOKEN: '',
      GH_TOKEN: '',
      TRIAGE_LOG_LEVEL: 'silent',
    },
    // Module-level token memo is per process
    pool: 'forks',
    testTimeout: 10000,
  },
});
