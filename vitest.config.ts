import {defineConfig} from 'vitest/config'

import {sharedConfig} from './vitest.shared'

/**
 * Root Vitest configuration
 *
 * Each workspace keeps its own vitest.config.ts; `npm test` at the root runs them all.
 */
export default defineConfig({
  test: {
    ...sharedConfig,
    projects: ['packages/shared-types', 'apps/api'],
  },
})
