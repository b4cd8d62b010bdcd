/**
 * Shortcuts for building mock environments in tests.
 *
 * @module @simfx/test-utils/helpers/mock
 */

import {
  makeMockState,
  summarize,
  type MockServer,
  type MockState,
  type MockStateOverrides
} from "@simfx/core"
import type { Assertion, AssertionSummary } from "@simfx/types"
import { fixtureSession } from "../fixtures/index.js"
import { createMockServer } from "../mocks/mock-server.js"

/**
 * Options for createTestState.
 */
export interface TestStateOptions<S> extends MockStateOverrides<S> {
  /** Defaults to a server answering 404 to everything. */
  server?: MockServer<S>
  /** Scenario name for the fixture session. Defaults to "default". */
  scenario?: string
}

/**
 * Build a mock environment with a fixture session.
 *
 * @example
 * ```typescript
 * const state = createTestState(0, { consoleIn: [["a", "b"], "z"] })
 * ```
 */
export const createTestState = <S>(local: S, options: TestStateOptions<S> = {}): MockState<S> => {
  const { server, scenario, ...overrides } = options
  return makeMockState(
    server ?? createMockServer<S>(),
    fixtureSession(scenario ?? "default"),
    local,
    overrides
  )
}

/** Statements of the failing assertions, for compact test expectations. */
export const failedStatements = (assertions: ReadonlyArray<Assertion>): ReadonlyArray<string> =>
  summarize(assertions).failures.map((a) => a.statement)

/** True when the summary records no failure. */
export const allPassed = (summary: AssertionSummary): boolean => summary.failureCount === 0
