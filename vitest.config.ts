import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      COHORT_LOG_LEVEL: 'silent',
      COHORT_LOG_FORMAT: 'json',
    },
  },
});
