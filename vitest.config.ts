import { defineConfig } from 'vitest/config';

// Wall-clock helpers work in local time; pin it so fixtures are stable.
process.env.TZ = 'UTC';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['__tests__/**/*.test.ts'],
    setupFiles: [],
  },
});
