import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['apps/*/tests/**/*.test.ts', 'packages/*/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      SITE_SECRET: 'test-site-secret-value',
      MONGODB_URI: 'mongodb://localhost:27017/mailhost-test',
    },
    restoreMocks: true,
  },
});
