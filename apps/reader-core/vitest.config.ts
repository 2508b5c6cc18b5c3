import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Pure logic, no DOM required
    environment: 'node',

    // Include patterns
    include: ['src/test/**/*.test.ts'],

    // Exclude patterns
    exclude: ['node_modules', 'dist'],

    // Environment variables for testing
    env: {
      NODE_ENV: 'test',
    },
  },
});
