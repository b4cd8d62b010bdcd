/**
 * Scripted mock servers.
 *
 * Provides a route-table `MockServer` with failure injection, a call log kept
 * in the client-local slot, and two ready-made servers: a counter and a
 * key/value resource store. Every server here is a pure function of the local
 * state and the request.
 *
 * @module @simfx/test-utils/mocks/mock-server
 */

import { Either } from "effect"
import type { HttpResult, MockServer } from "@simfx/core"
import { noContent, notFound, response, textResponse, transportFailure } from "./responses.js"

// ============================================================================
// Types
// ============================================================================

export type HttpMethod = "GET" | "POST" | "DELETE"

/**
 * A call the server received.
 */
export interface MockRequest {
  readonly method: HttpMethod
  readonly url: string
  /** Empty for GET and DELETE. */
  readonly payload: Uint8Array
}

export type RouteHandler<S> = (local: S, request: MockRequest) => readonly [HttpResult, S]

export interface MockRoute<S> {
  readonly method: HttpMethod
  readonly url: string
  readonly handler: RouteHandler<S>
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Configuration options for createMockServer.
 */
export interface MockServerConfig<S> {
  /** Matched by method and exact URL, first match wins. */
  routes?: ReadonlyArray<MockRoute<S>>
  /**
   * URLs that fail with a TransportFault instead of being routed.
   * Values are the failure reasons.
   */
  failures?: ReadonlyMap<string, string>
  /** Handler for unmatched requests. Defaults to a 404 response. */
  fallback?: RouteHandler<S>
}

/**
 * Create a mock server from a route table.
 *
 * @example
 * ```typescript
 * const server = createMockServer<number>({
 *   routes: [route("GET", "http://svc/ping", (local) => [textResponse("pong"), local])],
 *   failures: new Map([["http://svc/down", "connection refused"]])
 * })
 * const state = makeMockState(server, fixtureSession("ping"), 0)
 * ```
 */
export const createMockServer = <S>(config: MockServerConfig<S> = {}): MockServer<S> => {
  const routes = config.routes ?? []
  const failures = config.failures ?? new Map<string, string>()
  const fallback: RouteHandler<S> =
    config.fallback ?? ((local, request) => [notFound(request.url), local])

  const dispatch = (local: S, request: MockRequest): readonly [HttpResult, S] => {
    const reason = failures.get(request.url)
    if (reason !== undefined) {
      return [transportFailure(request.url, reason), local]
    }
    const match = routes.find((r) => r.method === request.method && r.url === request.url)
    return (match?.handler ?? fallback)(local, request)
  }

  return {
    get: (local, url) => dispatch(local, { method: "GET", url, payload: new Uint8Array() }),
    post: (local, url, payload) => dispatch(local, { method: "POST", url, payload }),
    delete: (local, url) => dispatch(local, { method: "DELETE", url, payload: new Uint8Array() })
  }
}

export const route = <S>(method: HttpMethod, url: string, handler: RouteHandler<S>): MockRoute<S> => ({
  method,
  url,
  handler
})

// ============================================================================
// Call log
// ============================================================================

/**
 * Client-local state paired with the requests received so far, oldest first.
 */
export interface CallLog<S> {
  readonly local: S
  readonly calls: ReadonlyArray<MockRequest>
}

/** A call log with no calls yet. */
export const callLog = <S>(local: S): CallLog<S> => ({ local, calls: [] })

/**
 * Wrap a server so that every request is appended to the call log in the
 * local state. Replaying a program from an earlier state replays its log too.
 *
 * @example
 * ```typescript
 * const server = withCallLog(counterServer("http://counter"))
 * const state = M.execute(program, createTestState(callLog(0), { server }))
 * expect(state.local.calls.map((c) => c.url)).toEqual(["http://counter/count"])
 * ```
 */
export const withCallLog = <S>(server: MockServer<S>): MockServer<CallLog<S>> => {
  const record = (
    log: CallLog<S>,
    request: MockRequest,
    handle: (local: S) => readonly [HttpResult, S]
  ): readonly [HttpResult, CallLog<S>] => {
    const [result, local] = handle(log.local)
    return [result, { local, calls: [...log.calls, request] }]
  }

  return {
    get: (log, url) =>
      record(log, { method: "GET", url, payload: new Uint8Array() }, (local) =>
        server.get(local, url)
      ),
    post: (log, url, payload) =>
      record(log, { method: "POST", url, payload }, (local) => server.post(local, url, payload)),
    delete: (log, url) =>
      record(log, { method: "DELETE", url, payload: new Uint8Array() }, (local) =>
        server.delete(local, url)
      )
  }
}

// ============================================================================
// Ready-made servers
// ============================================================================

/**
 * Counter kept in the local state.
 *
 * - `GET {base}/count` returns the count
 * - `POST {base}/increment` adds one and returns the new count
 * - `DELETE {base}/count` resets to zero
 */
export const counterServer = (base: string): MockServer<number> =>
  createMockServer<number>({
    routes: [
      route("GET", `${base}/count`, (count) => [textResponse(String(count)), count]),
      route("POST", `${base}/increment`, (count) => [textResponse(String(count + 1)), count + 1]),
      route("DELETE", `${base}/count`, () => [noContent(), 0])
    ]
  })

/** Resource bodies keyed by URL. */
export type ResourceStore = ReadonlyMap<string, Uint8Array>

/**
 * Key/value store over URLs. POST stores the payload (201), GET returns it
 * (or 404), DELETE removes it (204, or 404 when absent).
 */
export const resourceServer = (): MockServer<ResourceStore> =>
  createMockServer<ResourceStore>({
    fallback: (store, { method, url, payload }) => {
      const stored = store.get(url)
      switch (method) {
        case "GET":
          return [stored === undefined ? notFound(url) : Either.right(response(200, stored)), store]
        case "POST":
          return [Either.right(response(201)), new Map(store).set(url, payload)]
        case "DELETE": {
          if (stored === undefined) {
            return [notFound(url), store]
          }
          const rest = new Map(store)
          rest.delete(url)
          return [noContent(), rest]
        }
      }
    }
  })
