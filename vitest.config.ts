import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['__tests__/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
      RIOT_API_KEY: 'test-key'
    }
  }
});
