import type {UserConfig} from 'vitest/config'

/**
 * Shared Vitest configuration inherited by every project (`extends: true`)
 */
export const sharedConfig: UserConfig['test'] = {
  // Test file patterns
  include: ['src/**/*.{test,spec}.ts'],
  exclude: ['**/node_modules/**', '**/dist/**'],

  coverage: {
    provider: 'v8',
    reporter: ['text', 'lcov'],
    reportsDirectory: './coverage',
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/*.config.{js,ts,mjs,mts}',
      '**/*.d.ts',
      '**/test-setup.ts',
      '**/__tests__/**',
      '**/bin/**',
      '**/server.ts',
    ],
  },

  testTimeout: 30000,
  hookTimeout: 30000,

  // Globals (for better DX)
  globals: true,

  // Test isolation
  isolate: true,

  // Disable watch mode by default (CI friendly)
  watch: false,

  // Reset spies and stubbed globals between tests
  clearMocks: true,
  restoreMocks: true,
  unstubGlobals: true,
}
