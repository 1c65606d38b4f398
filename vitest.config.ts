import { defineConfig } from 'vitest/config';

const isCI = process.env.CI === 'true';

// Workspace packages export their TypeScript sources under this condition
const conditions = ['development'];

export default defineConfig({
  resolve: { conditions },
  ssr: { resolve: { conditions } },

  test: {
    environment: 'node',

    // Unit tests sit beside the sources; property suites live under test/
    include: ['packages/*/{src,test}/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    retry: 0,
    fileParallelism: !isCI,

    // Property-based suites run a few hundred cases
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.test.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/**/__fixtures__/**',
      ],
    },

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
