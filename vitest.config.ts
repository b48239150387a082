import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      exclude: ['**/dist/**', '**/node_modules/**', '**/*.d.ts'],
      include: ['packages/*/src/**/*.ts'],
      thresholds: {
        functions: 85,
        lines: 77,
        branches: 85,
      },
    },
  },
});
