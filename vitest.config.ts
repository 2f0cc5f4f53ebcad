import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    exclude: ['**/node_modules/**', '**/dist/**', '**/*.d.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['packages/*/src/**/*.ts', 'services/*/src/**/*.ts'],
      exclude: ['**/*.d.ts', '**/*.test.ts', '**/test/**', '**/index.ts'],
    },
    // Only the timer functions are faked, so promise-based helpers keep working
    fakeTimers: {
      toFake: ['setTimeout', 'clearTimeout', 'setInterval', 'clearInterval', 'Date'],
    },
    projects: [
      {
        extends: true,
        test: {
          name: 'common-types',
          include: ['packages/common-types/src/**/*.test.ts'],
        },
      },
      {
        extends: true,
        test: {
          name: 'pagination',
          include: ['packages/pagination/src/**/*.test.ts'],
        },
      },
      {
        extends: true,
        test: {
          name: 'bot-client',
          include: ['services/bot-client/src/**/*.test.ts'],
          setupFiles: ['services/bot-client/src/test/setup.ts'],
        },
      },
    ],
  },
});
