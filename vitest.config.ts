import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    // Test file pattern
    include: ['src/**/*.{test,spec}.ts'],

    exclude: ['node_modules', 'dist'],

    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
