/**
 * HTTP types shared by the mock responder and the live client.
 */

import { Schema } from "effect";

/** Response headers, lower-cased names. */
export const HttpHeadersSchema = Schema.Record({
  key: Schema.String,
  value: Schema.String,
});
export type HttpHeaders = typeof HttpHeadersSchema.Type;

/** A structured HTTP response with a raw byte body. */
export const HttpResponseSchema = Schema.Struct({
  status: Schema.Int.pipe(Schema.between(100, 599)),
  headers: HttpHeadersSchema,
  body: Schema.Uint8ArrayFromSelf,
});
export type HttpResponse = typeof HttpResponseSchema.Type;

/** Per-request options. Mock responders ignore them. */
export interface HttpRequestOptions {
  readonly headers?: HttpHeaders;
  readonly session?: SessionHandle;
}

/** Opaque handle for an HTTP session. */
export const SessionHandleSchema = Schema.TaggedStruct("SessionHandle", {
  id: Schema.String,
});
export type SessionHandle = typeof SessionHandleSchema.Type;

/** Build a session handle from its id. */
export const sessionHandle = (id: string): SessionHandle => ({
  _tag: "SessionHandle",
  id,
});
