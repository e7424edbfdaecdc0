import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['gifstream/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
  },
});
