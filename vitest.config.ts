import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Use forks pool to support process.chdir() in tests
    pool: 'forks',
    include: ['test/**/*.test.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    isolate: true,
    exclude: ['node_modules/**', 'dist/**'],
  },
  resolve: {
    extensions: ['.js', '.ts', '.json'],
  },
});
