import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        'tests/',
        '**/*.d.ts',
      ],
    },
    testTimeout: 30000,
    environment: 'node',
    onConsoleLog(log, type) {
      // Suppress expected error-path logs from negative-path tests
      if (type === 'stderr') {
        const suppressPatterns = [
          'Failed to open database',
          'Failed to apply schema',
        ];
        if (suppressPatterns.some((p) => log.includes(p))) return false;
      }
      return true;
    },
  },
});
