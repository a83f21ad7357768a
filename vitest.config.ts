/**
 * Vitest Configuration
 *
 * - environment: 'node' (Node.js test environment)
 * - coverage: v8 provider with text and lcov reporters
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'kestrel-syntax',
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/cli-parse.ts'],
    },
  },
});
