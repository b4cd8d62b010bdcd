/**
 * One program, two interpreters.
 *
 * The visitor-counter client below is written against the capability
 * interfaces only; the same test tree runs under the mock interpreter and
 * under the live interpreter with in-process platform stand-ins.
 */

import { describe, it, expect } from "vitest"
import { Effect, Either, Layer, Option } from "effect"
import { FileSystem, HttpClient, HttpClientResponse } from "@effect/platform"
import { SystemError } from "@effect/platform/Error"
import type { TypeLambda } from "effect/HKT"
import type { Assertion } from "@simfx/types"
import {
  LiveInterpreter,
  makeLiveInterpreter,
  makeMockInterpreter,
  printLine,
  runLiveSuite,
  runMockSuite,
  testCase,
  testGroup,
  testLabel,
  type Interpreter,
  type Program,
  type TestCase,
  type TestTree
} from "@simfx/core"
import {
  bodyText,
  captureLogs,
  counterServer,
  createTestState,
  decodeText,
  runEffect
} from "@simfx/test-utils"

const BASE = "http://counter.test"

// =============================================================================
// Code under test
// =============================================================================

/** Register a visit and announce the new count. */
const visit = <F extends TypeLambda>(I: Interpreter<F>): Program<F, string> =>
  I.flatMap(I.http.post(`${BASE}/increment`, new Uint8Array()), () =>
    I.flatMap(I.http.get(`${BASE}/count`), (result) => {
      const count = Option.getOrElse(bodyText(result), () => "?")
      return I.map(printLine(I, `visitors: ${count}`), () => count)
    })
  )

const suite = <F extends TypeLambda>(I: Interpreter<F>, expected: string): TestTree<TestCase<F>> =>
  testGroup<TestCase<F>>([
    testLabel(
      "counter",
      testCase<TestCase<F>>((ctx) =>
        I.map(visit(I), (count): ReadonlyArray<Assertion> => [
          ctx.equal(count, expected, "the server reports the visit"),
          ctx.isSubstring(count, `visitors: ${count}`, "the count is announced")
        ])
      )
    ),
    testLabel(
      "files",
      testCase<TestCase<F>>((ctx) =>
        I.map(I.try.attempt(I.files.readFile("missing.cfg")), (result): ReadonlyArray<Assertion> => [
          ctx.isTrue(Either.isLeft(result), "a missing file is reported"),
          ctx.equal(
            Either.match(result, { onLeft: (fault) => fault._tag, onRight: () => "read" }),
            "NotFoundFault",
            "as NotFoundFault"
          )
        ])
      )
    )
  ])

// =============================================================================
// Mock
// =============================================================================

describe("under the mock interpreter", () => {
  const M = makeMockInterpreter<number>()
  const initial = createTestState(0, { server: counterServer(BASE), fileExists: false })

  it("runs the program against the scripted counter", () => {
    const [count, state] = M.run(visit(M), initial)

    expect(count).toBe("1")
    expect(state.local).toBe(1)
    expect(state.consoleOut).toEqual(["visitors: 1\n"])
  })

  it("passes the suite and logs the outcome", async () => {
    const [result, logs] = await runEffect(captureLogs(runMockSuite(suite(M, "1"), initial)))

    expect(result.summary).toEqual({ successCount: 4, failureCount: 0, failures: [] })
    expect(result.assertions.map((a) => a.context)).toEqual(["counter", "counter", "files", "files"])
    expect(result.state.local).toBe(1)
    expect(logs.map((log) => [log.level, log.message, log.spans])).toEqual([
      ["INFO", "2 cases, 4 assertions passed", ["mock-suite"]]
    ])
  })

  it("reports failures without stopping", async () => {
    const [result, logs] = await runEffect(captureLogs(runMockSuite(suite(M, "2"), initial)))

    expect(result.summary.successCount).toBe(3)
    expect(result.summary.failures.map((a) => [a.context, a.statement])).toEqual([
      ["counter", '"1" is equal to "2"']
    ])
    expect(logs.map((log) => [log.level, log.message])).toEqual([
      ["WARN", "2 cases, 1 of 4 assertions failed"]
    ])
  })
})

// =============================================================================
// Live
// =============================================================================

describe("under the live interpreter", () => {
  const makeDeps = () => {
    const displayed: string[] = []
    let count = 41
    const fileSystem = FileSystem.makeNoop({
      readFile: (path) =>
        Effect.fail(
          new SystemError({ reason: "NotFound", module: "FileSystem", method: "readFile", pathOrDescriptor: path })
        )
    })
    const httpClient = HttpClient.make((request) => {
      if (request.method === "POST") {
        count += 1
      }
      return Effect.succeed(HttpClientResponse.fromWeb(request, new Response(String(count))))
    })
    const deps = {
      fileSystem,
      httpClient,
      terminal: {
        readLine: Effect.succeed(""),
        display: (text: string) =>
          Effect.sync(() => {
            displayed.push(text)
          })
      },
      errorOutput: () => Effect.void
    }
    return { deps, displayed }
  }

  it("runs the same program against the platform services", async () => {
    const { deps, displayed } = makeDeps()
    const I = await runEffect(makeLiveInterpreter(deps))

    const count = await runEffect(visit(I))

    expect(count).toBe("42")
    expect(displayed).toEqual(["visitors: 42\n"])
  })

  it("runs the same suite through the LiveInterpreter layer", async () => {
    const { deps } = makeDeps()
    const layer = Layer.effect(LiveInterpreter, makeLiveInterpreter(deps))

    const result = await runEffect(
      Effect.flatMap(LiveInterpreter, (I) => runLiveSuite(suite(I, "42"))).pipe(
        Effect.provide(layer)
      )
    )

    expect(result.summary.failureCount).toBe(0)
    expect(result.assertions).toHaveLength(4)
  })

  it("reads response bodies as bytes", async () => {
    const { deps } = makeDeps()
    const I = await runEffect(makeLiveInterpreter(deps))

    const result = await runEffect(I.http.get(`${BASE}/count`))

    expect(Either.isRight(result) && decodeText(result.right.body)).toBe("41")
  })
})
