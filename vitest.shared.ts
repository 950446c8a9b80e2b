import type {UserConfig} from 'vitest/config'

/**
 * Shared Vitest configuration for every workspace in the radio monorepo.
 * Package configs spread these settings and narrow `include`/`coverage`.
 */
export const sharedConfig = {
  include: ['**/*.{test,spec}.ts'],
  exclude: ['**/node_modules/**', '**/dist/**'],

  coverage: {
    provider: 'v8',
    reporter: ['text', 'lcov'],
    reportsDirectory: './coverage',
    exclude: ['**/node_modules/**', '**/dist/**', '**/*.config.ts', '**/test-setup.ts', '**/__tests__/**'],
  },

  testTimeout: 30000,
  hookTimeout: 30000,

  isolate: true,
  pool: 'threads',

  watch: false,

  // Clear mocks between tests
  clearMocks: true,
  mockReset: true,
  restoreMocks: true,
} satisfies NonNullable<UserConfig['test']>
