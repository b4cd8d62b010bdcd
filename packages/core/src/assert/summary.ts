/**
 * Assertion summaries.
 *
 * A summary counts passes and failures and keeps the failing assertions in
 * order. Summaries form a monoid under `combine` with identity `empty`, so
 * summaries of nested groups can be merged in any grouping.
 *
 * @module @simfx/core/assert/summary
 */

import { Console, Effect } from "effect"
import { isSuccess, type Assertion, type AssertionSummary } from "@simfx/types"
import { SuiteFailedError } from "../errors.js"
import { showAssertion } from "./assertion.js"

export const empty: AssertionSummary = { successCount: 0, failureCount: 0, failures: [] }

export const combine = (x: AssertionSummary, y: AssertionSummary): AssertionSummary => ({
  successCount: x.successCount + y.successCount,
  failureCount: x.failureCount + y.failureCount,
  failures: [...x.failures, ...y.failures]
})

/** Summarize a single assertion. */
export const summary = (assertion: Assertion): AssertionSummary =>
  isSuccess(assertion)
    ? { successCount: 1, failureCount: 0, failures: [] }
    : { successCount: 0, failureCount: 1, failures: [assertion] }

/** Summarize assertions left to right. */
export const summarize = (assertions: ReadonlyArray<Assertion>): AssertionSummary =>
  assertions.map(summary).reduce(combine, empty)

export const summarizeAll = (summaries: ReadonlyArray<AssertionSummary>): AssertionSummary =>
  summaries.reduce(combine, empty)

export const total = (s: AssertionSummary): number => s.successCount + s.failureCount

/**
 * The lines `printSummary` writes: each failure, then the totals.
 */
export const renderSummary = (s: AssertionSummary): ReadonlyArray<string> => [
  ...s.failures.map(showAssertion),
  `Assertions: ${total(s)}`,
  `Failures: ${s.failureCount}`
]

export const printSummary = (s: AssertionSummary): Effect.Effect<void> =>
  Effect.forEach(renderSummary(s), (line) => Console.log(line), { discard: true })

/**
 * Fail with SuiteFailedError if the summary records any failure.
 */
export const assertSuitePassed = (s: AssertionSummary): Effect.Effect<void, SuiteFailedError> =>
  s.failureCount === 0
    ? Effect.void
    : Effect.fail(new SuiteFailedError({ total: total(s), failureCount: s.failureCount }))
