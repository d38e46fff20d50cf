import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['cdk/test/**/*.test.ts'],
    environment: 'node',
    // CDK synthesis in the construct tests is slow on a cold start
    testTimeout: 30000,
  },
});
