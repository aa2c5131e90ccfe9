import type { UserConfig } from 'vitest/config';

type TestOptions = NonNullable<UserConfig['test']>;

/** Options shared by every workspace's Vitest configuration */
export interface BaseConfigOptions {
  /** Project name shown by the root runner */
  name: string;
  /** Extra coverage exclusions (type-only modules, re-exports) */
  coverageExclude?: string[];
  /** Overrides merged over the base test options */
  test?: TestOptions;
}

export const defineConfig = (options: BaseConfigOptions): UserConfig => {
  return {
    test: {
      name: options.name,
      environment: 'node',
      globals: false,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: ['src/**/*.ts'],
        exclude: ['**/index.ts', ...(options.coverageExclude ?? [])],
        thresholds: {
          lines: 95,
          functions: 95,
          branches: 90,
          statements: 95,
        },
      },
      ...options.test,
    },
  };
};
