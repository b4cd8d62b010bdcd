/**
 * Assertion constructors.
 *
 * `assertSuccessIf` is the only primitive; every other constructor supplies a
 * predicate and a statement describing the comparison. The optional last
 * argument is the context label path the assertion was made under.
 *
 * @module @simfx/core/assert/assertion
 */

import type { Assertion } from "@simfx/types"
import { isInfixOf, show, structurallyEqual, type Sequence } from "./equality.js"

/**
 * Construct a passing assertion.
 */
export const success = (statement: string, context: string, justification: string): Assertion => ({
  statement,
  justification,
  context,
  outcome: "pass"
})

/**
 * Construct a failing assertion.
 */
export const failure = (statement: string, context: string, justification: string): Assertion => ({
  statement,
  justification,
  context,
  outcome: "fail"
})

/**
 * Passes if `predicate` is true and fails otherwise.
 *
 * @param statement - what is being asserted
 * @param justification - why it is being asserted
 * @param context - where it is being asserted
 */
export const assertSuccessIf = (
  predicate: boolean,
  statement: string,
  justification: string,
  context = ""
): Assertion =>
  (predicate ? success : failure)(statement, context, justification)

/** Always passes. */
export const assertSuccess = (justification: string, context = ""): Assertion =>
  assertSuccessIf(true, "Success!", justification, context)

/** Always fails. */
export const assertFailure = (justification: string, context = ""): Assertion =>
  assertSuccessIf(false, "Failure :(", justification, context)

export const assertTrue = (value: boolean, justification: string, context = ""): Assertion =>
  assertSuccessIf(value === true, `${show(value)} is true`, justification, context)

export const assertFalse = (value: boolean, justification: string, context = ""): Assertion =>
  assertSuccessIf(value === false, `${show(value)} is false`, justification, context)

export const assertEqual = <A>(x: A, y: A, justification: string, context = ""): Assertion =>
  assertSuccessIf(
    structurallyEqual(x, y),
    `${show(x)} is equal to ${show(y)}`,
    justification,
    context
  )

export const assertNotEqual = <A>(x: A, y: A, justification: string, context = ""): Assertion =>
  assertSuccessIf(
    !structurallyEqual(x, y),
    `${show(x)} is not equal to ${show(y)}`,
    justification,
    context
  )

export const assertIsSubstring = <A>(
  needle: Sequence<A>,
  haystack: Sequence<A>,
  justification: string,
  context = ""
): Assertion =>
  assertSuccessIf(
    isInfixOf(needle, haystack),
    `${show(needle)} is a substring of ${show(haystack)}`,
    justification,
    context
  )

export const assertIsNotSubstring = <A>(
  needle: Sequence<A>,
  haystack: Sequence<A>,
  justification: string,
  context = ""
): Assertion =>
  assertSuccessIf(
    !isInfixOf(needle, haystack),
    `${show(needle)} is not a substring of ${show(haystack)}`,
    justification,
    context
  )

/**
 * Like `assertIsSubstring`, but the statement names the haystack instead of
 * rendering it. Handy when the haystack is large, say a page source.
 */
export const assertIsNamedSubstring = <A>(
  needle: Sequence<A>,
  haystack: readonly [Sequence<A>, string],
  justification: string,
  context = ""
): Assertion =>
  assertSuccessIf(
    isInfixOf(needle, haystack[0]),
    `${show(needle)} is a substring of ${haystack[1]}`,
    justification,
    context
  )

export const assertIsNotNamedSubstring = <A>(
  needle: Sequence<A>,
  haystack: readonly [Sequence<A>, string],
  justification: string,
  context = ""
): Assertion =>
  assertSuccessIf(
    !isInfixOf(needle, haystack[0]),
    `${show(needle)} is not a substring of ${haystack[1]}`,
    justification,
    context
  )

/**
 * Coloured, multi-line rendering of an assertion.
 */
export const showAssertion = (assertion: Assertion): string =>
  [
    assertion.outcome === "pass"
      ? "\x1b[1;32mValid Assertion\x1b[0;39;49m in"
      : "\x1b[1;31mInvalid Assertion\x1b[0;39;49m in",
    assertion.context,
    `\nassertion: ${assertion.statement}`,
    `\ncomment: ${assertion.justification}`
  ].join(" ")
