import {defineConfig} from 'vitest/config'

import {sharedConfig} from './vitest.shared'

/**
 * Root Vitest configuration for the Moodlist monorepo
 *
 * Runs every package with `npm test`, or one with `npx vitest run --project api`
 */
export default defineConfig({
  test: {
    ...sharedConfig,

    // Projects configuration for monorepo
    projects: [
      {
        extends: true,
        test: {
          environment: 'node',
          name: 'api',
          root: './apps/api',
          setupFiles: ['./src/test-setup.ts'],
        },
      },
      {
        extends: true,
        test: {
          environment: 'node',
          name: 'shared-types',
          root: './packages/shared-types',
        },
      },
    ],
  },
})
