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
          'Upload failed, asset left pending',
          'Image probe failed',
          'Video probe failed',
          'Cannot open metadata file',
          'Unsupported media type skipped',
          'Listed gallery image not found',
          'Several thumbnail images found',
          'Failed to remove staging directory',
        ];
        if (suppressPatterns.some((p) => log.includes(p))) return false;
      }
      return true;
    },
  },
});
