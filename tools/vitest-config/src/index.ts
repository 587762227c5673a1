import { mergeConfig, defineConfig as defineVitestConfig } from 'vitest/config';

type ConfigOverrides = Parameters<typeof mergeConfig>[1];

const baseConfig = defineVitestConfig({
  test: {
    environment: 'node',
    globals: true,
    mockReset: true,
    clearMocks: true,
    pool: 'threads',
    include: ['src/**/*.{test,spec}.ts'],
    coverage: {
      provider: 'v8',
      reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['**/index.ts', '**/*.test.ts', 'src/types.ts'],
      thresholds: {
        lines: 90,
        functions: 90,
        branches: 85,
        statements: 90,
      },
    },
  },
});

/**
 * Shared Vitest configuration for every workspace.
 *
 * Overrides are deep-merged over the defaults, so a package only spells out
 * what differs.
 */
export const defineConfig = (overrides: ConfigOverrides = {}) =>
  mergeConfig(baseConfig, overrides);
