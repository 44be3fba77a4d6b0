import { defineConfig } from 'vitest/config'

/**
 * Vitest configuration
 *
 * Unit tests live beside their sources; scenario tests under tests/.
 * Everything runs in plain Node.js.
 */
export default defineConfig({
  test: {
    include: ['**/*.test.ts'],
    exclude: ['**/node_modules/**', 'dist'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10_000,
  },
})
