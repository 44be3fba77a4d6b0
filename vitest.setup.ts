/**
 * Global test setup
 *
 * Every test starts from the default configuration, whatever the previous
 * test changed or the shell exported.
 */

import { afterEach, beforeEach, vi } from 'vitest'
import { resetConfig } from './lib/config.js'

beforeEach(() => {
  vi.stubEnv('DEBUG', '')
  vi.stubEnv('GRAPH_OBJECT_ID_KEY', '')
  vi.stubEnv('GRAPH_OBJECT_MAX_DEPTH', '')
  vi.stubEnv('GRAPH_OBJECT_LOG_LEVEL', '')
  resetConfig()
})

afterEach(() => {
  vi.unstubAllEnvs()
  vi.restoreAllMocks()
  resetConfig()
})
