import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // One project per workspace package
    projects: ['packages/@spacekit/*/vitest.config.ts'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      thresholds: {
        lines: 80,
        functions: 80,
        statements: 80,
        branches: 70,
      },
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.config.{ts,js}',
        '**/*.d.ts',
        '**/__tests__/**',
        'benchmark/**',
      ],
    },
  },
});
