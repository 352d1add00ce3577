import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
    // In-process Postgres boots once per suite; migrations run on boot.
    testTimeout: 30_000,
    hookTimeout: 60_000,
  },
});
