import { CONTEXT_SEPARATOR, type Assertion } from "@simfx/types"
import {
  assertEqual,
  assertFailure,
  assertFalse,
  assertIsNamedSubstring,
  assertIsNotNamedSubstring,
  assertIsNotSubstring,
  assertIsSubstring,
  assertNotEqual,
  assertSuccess,
  assertSuccessIf,
  assertTrue
} from "./assertion.js"
import type { Sequence } from "./equality.js"

/**
 * Immutable label path under which assertions are made.
 *
 * Nesting returns a new context; the parent is unchanged, so code after a
 * labelled subtree still sees the parent's name. The methods are the
 * assertion constructors with this context filled in.
 */
export class AssertContext {
  static readonly root = new AssertContext([])

  constructor(readonly path: ReadonlyArray<string>) {}

  /** Labels joined with `/`; the empty string at the root. */
  get name(): string {
    return this.path.join(CONTEXT_SEPARATOR)
  }

  nest(label: string): AssertContext {
    return new AssertContext([...this.path, label])
  }

  readonly successIf = (predicate: boolean, statement: string, justification: string): Assertion =>
    assertSuccessIf(predicate, statement, justification, this.name)

  readonly success = (justification: string): Assertion => assertSuccess(justification, this.name)

  readonly failure = (justification: string): Assertion => assertFailure(justification, this.name)

  readonly isTrue = (value: boolean, justification: string): Assertion =>
    assertTrue(value, justification, this.name)

  readonly isFalse = (value: boolean, justification: string): Assertion =>
    assertFalse(value, justification, this.name)

  readonly equal = <A>(x: A, y: A, justification: string): Assertion =>
    assertEqual(x, y, justification, this.name)

  readonly notEqual = <A>(x: A, y: A, justification: string): Assertion =>
    assertNotEqual(x, y, justification, this.name)

  readonly isSubstring = <A>(needle: Sequence<A>, haystack: Sequence<A>, justification: string): Assertion =>
    assertIsSubstring(needle, haystack, justification, this.name)

  readonly isNotSubstring = <A>(needle: Sequence<A>, haystack: Sequence<A>, justification: string): Assertion =>
    assertIsNotSubstring(needle, haystack, justification, this.name)

  readonly isNamedSubstring = <A>(
    needle: Sequence<A>,
    haystack: readonly [Sequence<A>, string],
    justification: string
  ): Assertion => assertIsNamedSubstring(needle, haystack, justification, this.name)

  readonly isNotNamedSubstring = <A>(
    needle: Sequence<A>,
    haystack: readonly [Sequence<A>, string],
    justification: string
  ): Assertion => assertIsNotNamedSubstring(needle, haystack, justification, this.name)
}
