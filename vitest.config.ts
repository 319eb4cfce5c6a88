import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
    env: {
      LOG_TO_FILE: 'false',
      LOG_LEVEL: 'error'
    }
  }
});
