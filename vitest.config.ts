import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    setupFiles: ['packages/relay-test/test/setup.ts'],
    environment: 'node',
    testTimeout: 20000
  }
});
