import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/file-setup.ts'],
    testTimeout: 10000,
    // One fake server per test file, no need to isolate further
    sequence: {
      concurrent: false,
    },
  },
});
