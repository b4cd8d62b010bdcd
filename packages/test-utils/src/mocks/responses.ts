/**
 * Builders and readers for structured HTTP responses.
 *
 * @module @simfx/test-utils/mocks/responses
 */

import { Either, Option } from "effect"
import type { HttpHeaders, HttpResponse } from "@simfx/types"
import { TransportFault, type HttpResult } from "@simfx/core"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

export const encodeText = (text: string): Uint8Array => encoder.encode(text)

export const decodeText = (bytes: Uint8Array): string => decoder.decode(bytes)

export const response = (
  status: number,
  body: string | Uint8Array = "",
  headers: HttpHeaders = {}
): HttpResponse => ({
  status,
  headers,
  body: typeof body === "string" ? encodeText(body) : body
})

/** A 200 response with a plain-text body. */
export const textResponse = (text: string, status = 200): HttpResult =>
  Either.right(response(status, text, { "content-type": "text/plain; charset=utf-8" }))

export const notFound = (url: string): HttpResult =>
  Either.right(response(404, `Not found: ${url}`))

export const noContent = (): HttpResult => Either.right(response(204))

export const transportFailure = (url: string, reason: string): HttpResult =>
  Either.left(new TransportFault({ url, reason }))

/** Status of the response, or none for a transport fault. */
export const statusOf = (result: HttpResult): Option.Option<number> =>
  Either.match(result, {
    onLeft: () => Option.none(),
    onRight: (res) => Option.some(res.status)
  })

/** Decoded body of the response, or none for a transport fault. */
export const bodyText = (result: HttpResult): Option.Option<string> =>
  Either.match(result, {
    onLeft: () => Option.none(),
    onRight: (res) => Option.some(decodeText(res.body))
  })
