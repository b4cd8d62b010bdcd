/**
 * Assertion types for simfx
 *
 * An assertion is one falsifiable claim: what was asserted, why, where,
 * and whether it held. Summaries aggregate many of them.
 */

import { Schema } from "effect";

// =============================================================================
// CONSTANTS
// =============================================================================

/** Outcomes an evaluated assertion can have. */
export const ASSERTION_OUTCOMES = ["pass", "fail"] as const;

/** Separator between nested context labels, e.g. `"login/redirect"`. */
export const CONTEXT_SEPARATOR = "/";

// =============================================================================
// SCHEMAS & TYPES
// =============================================================================

/** Assertion outcome, fixed when the assertion is constructed. */
export const AssertionOutcomeSchema = Schema.Literal(...ASSERTION_OUTCOMES);
export type AssertionOutcome = typeof AssertionOutcomeSchema.Type;

/**
 * A single evaluated assertion.
 *
 * - `statement`: the claim (the what)
 * - `justification`: a comment explaining the claim (the why)
 * - `context`: the label path the claim was made under (the where)
 */
export const AssertionSchema = Schema.Struct({
  statement: Schema.String,
  justification: Schema.String,
  context: Schema.String,
  outcome: AssertionOutcomeSchema,
});
export type Assertion = typeof AssertionSchema.Type;

/** Counts of passing and failing assertions plus the failures themselves, in order. */
export const AssertionSummarySchema = Schema.Struct({
  successCount: Schema.Int.pipe(Schema.nonNegative()),
  failureCount: Schema.Int.pipe(Schema.nonNegative()),
  failures: Schema.Array(AssertionSchema),
});
export type AssertionSummary = typeof AssertionSummarySchema.Type;

// =============================================================================
// HELPERS
// =============================================================================

/** Check whether an assertion passed. */
export const isSuccess = (assertion: Assertion): boolean =>
  assertion.outcome === "pass";
