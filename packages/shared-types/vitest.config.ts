import {defineConfig} from 'vitest/config'

import {sharedConfig} from '../../vitest.shared'

/**
 * Vitest configuration for @radio/shared-types
 * Environment: node (schema and validation testing)
 */
export default defineConfig({
  test: {
    ...sharedConfig,
    name: 'shared-types',
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      ...sharedConfig.coverage,
      include: ['src/**/*.ts'],
    },
  },
})
