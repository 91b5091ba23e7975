import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // Calendar-day arithmetic in the tests assumes UTC
    env: { TZ: 'UTC' },
  },
});
