import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    // git subprocesses and the tsx-launched hook make the end-to-end suite slow
    testTimeout: 60000,
    hookTimeout: 30000,
  },
});
