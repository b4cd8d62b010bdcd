/**
 * Mock interpreter
 *
 * Implements every capability by reading and replacing the `MockState`.
 * Each capability operation is a single atomic step; the clock only moves
 * when steps are sequenced.
 *
 * @example
 * ```typescript
 * const M = makeMockInterpreter<number>()
 * const program = M.gen(function* () {
 *   const name = yield* M.console.getLine("stdin")
 *   yield* M.console.putStrLn("stdout", `Hello, ${name}`)
 * })
 * const state = M.execute(program, makeMockState(server, session, 0, {
 *   consoleIn: [["alice"], ""]
 * }))
 * ```
 *
 * @module @simfx/core/mock/mock-interpreter
 */

import { Either, Option, type DateTime } from "effect"
import type { Handle, SessionHandle } from "@simfx/types"
import type {
  ConsoleCapability,
  FilesCapability,
  HttpCapability,
  HttpResult,
  Interpreter,
  RandomCapability,
  TimerCapability,
  TryCapability
} from "../capabilities.js"
import { EndOfInputFault, NotFoundFault, StorageFullFault, type Fault } from "../errors.js"
import { next, nextBetween } from "./mock-gen.js"
import { MockIO, type MockIOTypeLambda, type MockStep } from "./mock-io.js"
import type { MockServer, MockState } from "./mock-state.js"

/** Character returned by every mock `getChar`: answers yes to any prompt. */
export const MOCK_CHAR_INPUT = "y"

/** Direct access to the simulated environment, for setup and inspection. */
export interface MockStateAccess<S> {
  readonly getState: MockIO<S, MockState<S>>
  readonly putState: (state: MockState<S>) => MockIO<S, void>
  readonly modifyState: (f: (state: MockState<S>) => MockState<S>) => MockIO<S, void>
  readonly getLocal: MockIO<S, S>
  readonly putLocal: (local: S) => MockIO<S, void>
  readonly getCapturedFault: MockIO<S, Option.Option<Fault>>
  readonly clearFault: MockIO<S, void>
}

export interface MockInterpreter<S>
  extends Interpreter<MockIOTypeLambda<S>>,
    MockStateAccess<S> {
  readonly fail: <A>(fault: Fault, placeholder: A) => MockIO<S, A>
  readonly gen: <R>(body: () => Generator<MockStep<S>, R, unknown>) => MockIO<S, R>
  readonly run: <A>(program: MockIO<S, A>, state: MockState<S>) => readonly [A, MockState<S>]
  readonly evaluate: <A>(program: MockIO<S, A>, state: MockState<S>) => A
  readonly execute: <A>(program: MockIO<S, A>, state: MockState<S>) => MockState<S>
}

const unit = <S>(): MockIO<S, void> => MockIO.succeed<S, void>(undefined)

const update = <S>(f: (state: MockState<S>) => MockState<S>): MockIO<S, void> =>
  MockIO.transition<S, void>((state) => [undefined, f(state)])

const inspect = <S, A>(f: (state: MockState<S>) => A): MockIO<S, A> =>
  MockIO.transition<S, A>((state) => [f(state), state])

// =============================================================================
// Capabilities
// =============================================================================

const makeConsole = <S>(): ConsoleCapability<MockIOTypeLambda<S>> => {
  const putStr = (handle: Handle, text: string): MockIO<S, void> =>
    update((state) => ({
      ...state,
      printLog: [[handle, text], ...state.printLog],
      consoleOut: handle === "stdout" ? [text, ...state.consoleOut] : state.consoleOut
    }))

  return {
    stdin: MockIO.succeed<S, Handle>("stdin"),
    stdout: MockIO.succeed<S, Handle>("stdout"),
    stderr: MockIO.succeed<S, Handle>("stderr"),
    getEcho: () => MockIO.succeed<S, boolean>(true),
    setEcho: () => unit<S>(),
    getChar: () => MockIO.succeed<S, string>(MOCK_CHAR_INPUT),
    getLine: () =>
      MockIO.transition<S, string>((state) => {
        const [queue, fallback] = state.consoleIn
        const [line, ...rest] = queue
        if (line === undefined) {
          return [fallback, state]
        }
        return [line, { ...state, consoleIn: [rest, fallback] }]
      }),
    putChar: putStr,
    putStr,
    putStrLn: (handle, text) => putStr(handle, `${text}\n`),
    flush: () => unit<S>()
  }
}

const makeTimer = <S>(): TimerCapability<MockIOTypeLambda<S>> => ({
  sleep: () => unit<S>(),
  now: inspect<S, DateTime.Utc>((state) => state.clock)
})

const makeTry = <S>(): TryCapability<MockIOTypeLambda<S>> => ({
  attempt: <A>(program: MockIO<S, A>) =>
    MockIO.transition<S, Either.Either<A, Fault>>((state) => {
      const [value, successor] = program.run(state)
      return [
        Option.match(successor.capturedFault, {
          onNone: () => Either.right(value),
          onSome: (fault) => Either.left(fault)
        }),
        successor
      ]
    })
})

const makeFiles = <S>(): FilesCapability<MockIOTypeLambda<S>> => ({
  exists: () => inspect<S, boolean>((state) => state.fileExists),
  readFile: (path) =>
    MockIO.transition<S, Uint8Array>((state) => {
      if (!state.fileExists) {
        return MockIO.fail<S, Uint8Array>(new NotFoundFault({ path }), new Uint8Array()).run(state)
      }
      const [contents, ...rest] = state.fileIn
      if (contents === undefined) {
        return MockIO.fail<S, Uint8Array>(new EndOfInputFault({ path }), new Uint8Array()).run(state)
      }
      return [contents, { ...state, fileIn: rest }]
    }),
  writeFile: (path, contents) =>
    MockIO.transition<S, void>((state) =>
      state.fileFull
        ? MockIO.fail<S, void>(new StorageFullFault({ path }), undefined).run(state)
        : [undefined, { ...state, fileOut: [contents, ...state.fileOut] }]
    )
})

const makeRandom = <S>(): RandomCapability<MockIOTypeLambda<S>> => ({
  nextInt: MockIO.transition<S, number>((state) => {
    const [value, rng] = next(state.rng)
    return [value, { ...state, rng }]
  }),
  nextIntBetween: (lo, hi) =>
    MockIO.transition<S, number>((state) => {
      const [value, rng] = nextBetween(state.rng, lo, hi)
      return [value, { ...state, rng }]
    })
})

const makeHttp = <S>(): HttpCapability<MockIOTypeLambda<S>> => {
  const respond = (
    handler: (server: MockServer<S>, local: S) => readonly [HttpResult, S]
  ): MockIO<S, HttpResult> =>
    MockIO.transition<S, HttpResult>((state) => {
      const [result, local] = handler(state.server, state.local)
      return [result, { ...state, local }]
    })

  return {
    get: (url) => respond((server, local) => server.get(local, url)),
    post: (url, payload) => respond((server, local) => server.post(local, url, payload)),
    delete: (url) => respond((server, local) => server.delete(local, url)),
    newSession: inspect<S, SessionHandle>((state) => state.session)
  }
}

// =============================================================================
// Interpreter
// =============================================================================

/**
 * Create the mock interpreter for client-local state `S`.
 */
export const makeMockInterpreter = <S>(): MockInterpreter<S> => ({
  succeed: <A>(value: A) => MockIO.succeed<S, A>(value),
  flatMap: (self, f) => self.flatMap(f),
  map: (self, f) => self.map(f),
  andThen: (self, that) => self.andThen(that),

  console: makeConsole<S>(),
  timer: makeTimer<S>(),
  try: makeTry<S>(),
  files: makeFiles<S>(),
  random: makeRandom<S>(),
  http: makeHttp<S>(),

  getState: inspect<S, MockState<S>>((state) => state),
  putState: (state) => MockIO.transition<S, void>(() => [undefined, state]),
  modifyState: (f) => update(f),
  getLocal: inspect<S, S>((state) => state.local),
  putLocal: (local) => update<S>((state) => ({ ...state, local })),
  getCapturedFault: inspect<S, Option.Option<Fault>>((state) => state.capturedFault),
  clearFault: update<S>((state) => ({ ...state, capturedFault: Option.none() })),

  fail: <A>(fault: Fault, placeholder: A) => MockIO.fail<S, A>(fault, placeholder),
  gen: <R>(body: () => Generator<MockStep<S>, R, unknown>) => MockIO.gen<S, R>(body),
  run: (program, state) => program.run(state),
  evaluate: (program, state) => program.run(state)[0],
  execute: (program, state) => program.run(state)[1]
})
