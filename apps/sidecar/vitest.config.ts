import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json-summary'],
      thresholds: {
        lines: 90,
        statements: 90,
        branches: 85,
        functions: 90,
      },
      exclude: [
        'dist/**',
        'coverage/**',
        'src/main.ts',
        'src/reader/pg.ts',
        'vitest.config.ts',
      ],
    },
  },
});
