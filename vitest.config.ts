import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      OPENAI_API_KEY: 'test-api-key',
      EVALUATION_ENABLED: '0',
    },
  },
});
