import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Training tests run full-batch gradient descent
    testTimeout: 10000,
    globals: true,
    include: ['src/**/*.test.ts'],
  },
});
