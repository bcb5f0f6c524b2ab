import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    // Disable file watching by default
    watch: false,
    // Suites share os.tmpdir(); keep them in one process
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    clearMocks: true,
    isolate: true,
    reporters: ['default'],
  },
});
