import { defineConfig, coverageConfigDefaults } from 'vitest/config'
import { resolve, dirname } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))
const isCI = process.env.CI === 'true'

export default defineConfig({
  resolve: {
    alias: {
      '@glucose-report/core': resolve(__dirname, 'packages/core/src/index.ts'),
      '@glucose-report/tidepool': resolve(__dirname, 'packages/tidepool/src/index.ts'),
      '@glucose-report/readings': resolve(__dirname, 'packages/readings/src/index.ts'),
      '@glucose-report/report': resolve(__dirname, 'packages/report/src/index.ts'),
    },
  },
  test: {
    include: [
      'packages/*/src/**/*.test.ts',
      'packages/*/src/**/*.spec.ts',
    ],
    exclude: ['node_modules/**'],

    coverage: {
      provider: 'v8',
      reporter: isCI ? ['text', 'json', 'lcov'] : ['text', 'html'],
      reportsDirectory: './coverage',

      include: ['packages/*/src/**/*.ts'],

      exclude: [
        ...coverageConfigDefaults.exclude,
        '**/*.test.ts',
        '**/__tests__/**',
        '**/index.ts',
        // Entry points wired to the process and the network
        'packages/server/src/cli.ts',
        'packages/server/src/server.ts',
      ],

      thresholds: {
        lines: 60,
        branches: 50,
        functions: 60,
        statements: 60,
      },
    },
  },
})
