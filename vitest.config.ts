import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['server/**/__tests__/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      QUEUE_DRIVER: 'inmemory',
    },
    testTimeout: 10000,
  },
});
