import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/server/unit/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
    },
  },
});
