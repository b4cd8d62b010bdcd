/**
 * @simfx/types - Shared TypeScript types for simfx
 *
 * Effect Schema definitions providing both compile-time types and runtime validation.
 *
 * @example
 * ```typescript
 * import { type Assertion, AssertionSchema, type HttpResponse } from "@simfx/types";
 * ```
 */

// Assertion types & schemas
export {
  ASSERTION_OUTCOMES,
  CONTEXT_SEPARATOR,
  AssertionOutcomeSchema,
  AssertionSchema,
  AssertionSummarySchema,
  isSuccess,
  type AssertionOutcome,
  type Assertion,
  type AssertionSummary,
} from "./assertion.js";

// HTTP types & schemas
export {
  HttpHeadersSchema,
  HttpResponseSchema,
  SessionHandleSchema,
  sessionHandle,
  type HttpHeaders,
  type HttpResponse,
  type HttpRequestOptions,
  type SessionHandle,
} from "./http.js";

// Console types & schemas
export {
  HANDLES,
  HandleSchema,
  type Handle,
} from "./console.js";
