import {defineConfig} from 'vitest/config'

import {sharedConfig} from '../../vitest.shared'

/**
 * Vitest configuration for @radio/api (Node.js server)
 */
export default defineConfig({
  test: {
    ...sharedConfig,
    name: 'api',
    environment: 'node',
    setupFiles: ['./src/test-setup.ts'],
    include: ['src/**/*.test.ts'],
    coverage: {
      ...sharedConfig.coverage,
      include: ['src/**/*.ts'],
      exclude: [...(sharedConfig.coverage?.exclude ?? []), 'src/**/*.test.ts', 'src/server.ts'],
    },
  },
})
