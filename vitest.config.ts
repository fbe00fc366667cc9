import { defineConfig, defaultExclude } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    env: {
      LOG_TO_FILE: 'false',
    },
    coverage: {
      reporter: ['text', 'html', 'lcov'],
      exclude: [...defaultExclude, '**/*.test.ts', 'src/scripts/**'],
    },
    testTimeout: Number(process.env.TEST_TIMEOUT ?? 10000),
  },
});
