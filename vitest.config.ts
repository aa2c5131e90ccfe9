import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      'tools/logger/vitest.config.ts',
      'packages/shared/vitest.config.ts',
      'packages/page-analysis/vitest.config.ts',
    ],
  },
});
