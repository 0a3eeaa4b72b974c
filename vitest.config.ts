import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      // Unit tests in packages
      'packages/**/src/**/__tests__/**/*.test.ts',
    ],
    exclude: ['node_modules/', 'dist/', '**/node_modules/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.d.ts', '**/*.config.*'],
    },
  },
  resolve: {
    alias: {
      '@claimshield/lib-core': path.resolve(__dirname, 'packages/lib-core/src'),
      '@claimshield/policy-core': path.resolve(__dirname, 'packages/policy-core/src'),
    },
  },
});
