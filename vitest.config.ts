import {defineConfig} from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.spec.ts', 'examples/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'node_modules/',
        'examples/',
        'dist/',
        '**/*.spec.ts',
        '**/__tests__/**',
        '*.config.ts',
      ],
    },
  },
});
