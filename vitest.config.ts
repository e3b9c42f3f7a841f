import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    // Blocking-transport tests start a child Node process per call.
    testTimeout: 20_000
  }
});
