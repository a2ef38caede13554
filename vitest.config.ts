import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.stageline/**',
    ],
    testTimeout: 20_000,
    coverage: {
      provider: 'v8',
      reporter: ['lcov', 'text'],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/.stageline/**',
        '**/tests/**',
      ],
    },
  },
});
