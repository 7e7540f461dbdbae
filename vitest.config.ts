import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false, // Prefer explicit imports for better portability
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      exclude: ['node_modules/', 'dist/'],
    },
    sequence: {
      // Test files share module-level SQLite handles; keep them sequential
      concurrent: false,
    },
  },
});
