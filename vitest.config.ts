import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    globals: true,
    setupFiles: ['./src/__tests__/setup.ts'],
    coverage: {
      provider: 'v8',
      exclude: [
        'src/index.ts',
        'src/__tests__/**',
        'dist/**',
        'node_modules/**',
        '*.config.*',
      ],
    },
  },
});
