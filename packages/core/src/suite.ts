/**
 * Suite runners: execute a test tree under an interpreter, summarize the
 * assertions and log the outcome.
 *
 * @module @simfx/core/suite
 */

import { Effect } from "effect"
import type { Assertion, AssertionSummary } from "@simfx/types"
import { summarize } from "./assert/summary.js"
import { LiveInterpreter } from "./live/live-interpreter.js"
import { makeMockInterpreter, type MockInterpreter } from "./mock/mock-interpreter.js"
import type { MockIOTypeLambda } from "./mock/mock-io.js"
import type { MockState } from "./mock/mock-state.js"
import { countCases, runTestTree, type TestCase, type TestTree } from "./test-tree.js"

export interface SuiteResult {
  readonly assertions: ReadonlyArray<Assertion>
  readonly summary: AssertionSummary
}

export interface MockSuiteResult<S> extends SuiteResult {
  /** Environment after the last case ran. */
  readonly state: MockState<S>
}

const logOutcome = (cases: number, summary: AssertionSummary) =>
  summary.failureCount === 0
    ? Effect.logInfo(`${cases} cases, ${summary.successCount} assertions passed`)
    : Effect.logWarning(
        `${cases} cases, ${summary.failureCount} of ${summary.successCount + summary.failureCount} assertions failed`
      )

/**
 * Run a tree against a simulated environment.
 *
 * The run itself is pure; the Effect only adds logging.
 */
export const runMockSuite = <S>(
  tree: TestTree<TestCase<MockIOTypeLambda<S>>>,
  state: MockState<S>,
  interpreter: MockInterpreter<S> = makeMockInterpreter<S>()
): Effect.Effect<MockSuiteResult<S>> =>
  Effect.gen(function* () {
    const [assertions, finalState] = interpreter.run(runTestTree(interpreter, tree), state)
    const summary = summarize(assertions)
    yield* logOutcome(countCases(tree), summary)
    return { assertions, summary, state: finalState }
  }).pipe(Effect.withLogSpan("mock-suite"))

/**
 * Run a tree against the live interpreter in context.
 */
export const runLiveSuite = (
  tree: TestTree<TestCase<Effect.EffectTypeLambda>>
) =>
  Effect.gen(function* () {
    const interpreter = yield* LiveInterpreter
    const assertions = yield* runTestTree(interpreter, tree)
    const summary = summarize(assertions)
    yield* logOutcome(countCases(tree), summary)
    const result: SuiteResult = { assertions, summary }
    return result
  }).pipe(Effect.withLogSpan("live-suite"))
