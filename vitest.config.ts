import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    // Filesystem-heavy suites; CI runners are slower
    testTimeout: process.env['CI'] ? 60000 : 30000,
    hookTimeout: process.env['CI'] ? 60000 : 30000,
    reporters: ['default'],
    env: {
      SEO_PIPELINE_LOG_LEVEL: 'silent',
    },
  },
});
