/**
 * Test helper utilities.
 *
 * @module @simfx/test-utils/helpers
 */

// Effect test helpers
export {
  runEffect,
  runEffectFail,
  runEffectEither,
  expectEffectSuccess,
  expectEffectFailure,
  captureLogs,
  type RunEffectOptions,
  type EffectResult,
  type CapturedLog
} from "./effect.js"

// Mock environment helpers
export {
  createTestState,
  failedStatements,
  allPassed,
  type TestStateOptions
} from "./mock.js"
