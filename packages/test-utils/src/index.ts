/**
 * @simfx/test-utils - Test runners, scripted servers and fixtures
 *
 * @example
 * ```typescript
 * import {
 *   counterServer,
 *   createTestState,
 *   fixtureSession,
 *   runEffect
 * } from '@simfx/test-utils'
 * ```
 *
 * @module @simfx/test-utils
 */

// Fixtures - SHA256-based deterministic IDs
export {
  fixtureId,
  namespacedFixtureId,
  sequentialFixtureIds,
  fixtureSession
} from "./fixtures/index.js"

// Effect and mock environment helpers
export * from "./helpers/index.js"

// Mock servers
export * from "./mocks/index.js"
