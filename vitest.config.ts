/**
 * Vitest Configuration
 *
 * Runs the test suite under tests/ in a Node.js environment.
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'jack-analyzer',
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/cli.ts'],
    },
  },
});
