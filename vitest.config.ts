import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      // Entry points that need a real browser or a terminal.
      exclude: ['src/cli/main.ts', 'src/browser/runner.ts', 'src/browser/prescan.ts'],
    },
  },
});
