/**
 * Mock server unit tests.
 *
 * - createMockServer: routing, failure injection, fallback
 * - withCallLog: request log kept in local state
 * - counterServer and resourceServer: local state threading
 * - response helpers
 */

import { describe, it, expect } from "vitest"
import { Either, Option } from "effect"
import { makeMockInterpreter } from "@simfx/core"
import { createTestState } from "../helpers/mock.js"
import {
  callLog,
  counterServer,
  createMockServer,
  resourceServer,
  route,
  withCallLog,
  type CallLog,
  type ResourceStore
} from "./mock-server.js"
import { bodyText, decodeText, encodeText, response, statusOf, textResponse } from "./responses.js"

// =============================================================================
// createMockServer Tests
// =============================================================================

describe("createMockServer", () => {
  describe("routing", () => {
    it("dispatches on method and exact URL", () => {
      const server = createMockServer<number>({
        routes: [
          route("GET", "http://svc/ping", (local) => [textResponse("pong"), local]),
          route("POST", "http://svc/ping", (local) => [textResponse("posted", 201), local + 1])
        ]
      })

      const [got, afterGet] = server.get(0, "http://svc/ping")
      const [posted, afterPost] = server.post(afterGet, "http://svc/ping", encodeText("x"))

      expect(bodyText(got)).toEqual(Option.some("pong"))
      expect(statusOf(posted)).toEqual(Option.some(201))
      expect(afterPost).toBe(1)
    })

    it("answers 404 to unmatched requests by default", () => {
      const server = createMockServer<number>()

      const [result, local] = server.delete(3, "http://svc/missing")

      expect(statusOf(result)).toEqual(Option.some(404))
      expect(bodyText(result)).toEqual(Option.some("Not found: http://svc/missing"))
      expect(local).toBe(3)
    })

    it("uses the configured fallback", () => {
      const server = createMockServer<string>({
        fallback: (local, request) => [textResponse(request.method), `${local}!`]
      })

      const [result, local] = server.get("a", "http://svc/anything")

      expect(bodyText(result)).toEqual(Option.some("GET"))
      expect(local).toBe("a!")
    })
  })

  describe("failure injection", () => {
    it("fails listed URLs with a transport fault and keeps local state", () => {
      const server = createMockServer<number>({
        routes: [route("GET", "http://svc/down", (local) => [textResponse("up"), local + 1])],
        failures: new Map([["http://svc/down", "connection refused"]])
      })

      const [result, local] = server.get(4, "http://svc/down")

      expect(local).toBe(4)
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe("TransportFault")
        expect(result.left.message).toBe(
          "Transport error for http://svc/down: connection refused"
        )
      }
    })
  })
})

// =============================================================================
// withCallLog Tests
// =============================================================================

describe("withCallLog", () => {
  const server = withCallLog(counterServer("http://counter"))

  it("records all calls in order alongside the wrapped state", () => {
    const [, afterGet] = server.get(callLog(0), "http://counter/count")
    const [posted, afterPost] = server.post(afterGet, "http://counter/increment", encodeText("body"))

    expect(bodyText(posted)).toEqual(Option.some("1"))
    expect(afterPost.local).toBe(1)
    expect(afterPost.calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      "GET http://counter/count",
      "POST http://counter/increment"
    ])
    expect(decodeText(afterPost.calls[1]?.payload ?? new Uint8Array())).toBe("body")
  })

  it("leaves the previous log untouched", () => {
    const initial = callLog(0)

    server.get(initial, "http://counter/count")

    expect(initial.calls).toEqual([])
  })

  it("logs only the requests of each run when replayed from one state", () => {
    const M = makeMockInterpreter<CallLog<number>>()
    const initial = createTestState(callLog(0), { server })
    const program = M.http.get("http://x")

    const first = M.execute(program, initial)
    const second = M.execute(program, initial)

    expect(first.local.calls).toHaveLength(1)
    expect(second.local.calls).toHaveLength(1)
    expect(initial.local.calls).toHaveLength(0)
  })
})

// =============================================================================
// Ready-made servers
// =============================================================================

describe("counterServer", () => {
  const server = counterServer("http://counter")

  it("increments and reads the count", () => {
    const [first, one] = server.post(0, "http://counter/increment", new Uint8Array())
    const [, two] = server.post(one, "http://counter/increment", new Uint8Array())
    const [read, same] = server.get(two, "http://counter/count")

    expect(bodyText(first)).toEqual(Option.some("1"))
    expect(bodyText(read)).toEqual(Option.some("2"))
    expect(same).toBe(2)
  })

  it("resets on delete", () => {
    const [result, count] = server.delete(9, "http://counter/count")

    expect(statusOf(result)).toEqual(Option.some(204))
    expect(count).toBe(0)
  })
})

describe("resourceServer", () => {
  const server = resourceServer()
  const empty: ResourceStore = new Map()

  it("stores, reads and deletes resources", () => {
    const [created, stored] = server.post(empty, "http://kv/a", encodeText("alpha"))
    const [read] = server.get(stored, "http://kv/a")
    const [deleted, cleared] = server.delete(stored, "http://kv/a")
    const [missing] = server.get(cleared, "http://kv/a")

    expect(statusOf(created)).toEqual(Option.some(201))
    expect(bodyText(read)).toEqual(Option.some("alpha"))
    expect(statusOf(deleted)).toEqual(Option.some(204))
    expect(statusOf(missing)).toEqual(Option.some(404))
  })

  it("leaves the previous store untouched", () => {
    const [, stored] = server.post(empty, "http://kv/b", encodeText("beta"))

    expect(empty.size).toBe(0)
    expect(stored.size).toBe(1)
  })

  it("answers 404 when deleting an absent resource", () => {
    const [result, store] = server.delete(empty, "http://kv/none")

    expect(statusOf(result)).toEqual(Option.some(404))
    expect(store).toBe(empty)
  })
})

// =============================================================================
// Response helpers
// =============================================================================

describe("response helpers", () => {
  it("encodes string bodies as UTF-8", () => {
    expect(Array.from(response(200, "hé").body)).toEqual([104, 195, 169])
  })

  it("reports no status or body for transport faults", () => {
    const [result] = createMockServer<number>({
      failures: new Map([["http://x", "reset"]])
    }).get(0, "http://x")

    expect(statusOf(result)).toEqual(Option.none())
    expect(bodyText(result)).toEqual(Option.none())
  })
})
