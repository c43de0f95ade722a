import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    // Worker processes keep temp-dir tests isolated from each other
    pool: 'forks',
    testTimeout: process.platform === 'win32' ? 30000 : 5000,
    hookTimeout: process.platform === 'win32' ? 30000 : 10000,
    isolate: true,
    exclude: ['node_modules/**', 'dist/**'],
  },
  resolve: {
    extensions: ['.js', '.ts', '.json'],
  },
});
