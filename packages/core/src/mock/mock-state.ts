/**
 * Simulated environment threaded through a mock run.
 *
 * Every field is immutable; mock operations return a fresh successor state,
 * so any earlier state can be kept around as a snapshot.
 */

import { DateTime, Option } from "effect"
import type { Handle, SessionHandle } from "@simfx/types"
import type { HttpResult } from "../capabilities.js"
import type { Fault } from "../errors.js"
import { DEFAULT_SEED, mockGen, type MockGen } from "./mock-gen.js"

/**
 * Scripted HTTP responder. Each handler receives the client-local state and
 * returns the result together with the updated local state.
 */
export interface MockServer<S> {
  readonly get: (local: S, url: string) => readonly [HttpResult, S]
  readonly post: (local: S, url: string, payload: Uint8Array) => readonly [HttpResult, S]
  readonly delete: (local: S, url: string) => readonly [HttpResult, S]
}

export interface MockState<S> {
  /** Writes to any output handle, most recent first. */
  readonly printLog: ReadonlyArray<readonly [Handle, string]>
  /** Writes to stdout, most recent first. */
  readonly consoleOut: ReadonlyArray<string>
  /** Queued input lines and the line returned once the queue is empty. */
  readonly consoleIn: readonly [ReadonlyArray<string>, string]
  readonly clock: DateTime.Utc
  readonly capturedFault: Option.Option<Fault>
  readonly server: MockServer<S>
  readonly session: SessionHandle
  readonly fileExists: boolean
  readonly fileFull: boolean
  /** Written payloads, most recent first. */
  readonly fileOut: ReadonlyArray<Uint8Array>
  /** Payloads returned by successive reads, front first. */
  readonly fileIn: ReadonlyArray<Uint8Array>
  readonly rng: MockGen
  readonly local: S
}

/** Everything a caller may override when building a state. */
export type MockStateOverrides<S> = Partial<
  Omit<MockState<S>, "server" | "session" | "local">
>

export const DEFAULT_EPOCH_ISO = "1858-11-17T00:00:00.000Z"

export const DEFAULT_EPOCH: DateTime.Utc = DateTime.unsafeMake(DEFAULT_EPOCH_ISO)

/**
 * Build a fresh environment from a responder, a session handle and the
 * initial client-local state.
 *
 * @example
 * ```typescript
 * const state = makeMockState(server, sessionHandle("s1"), 0, {
 *   consoleIn: [["alice"], ""]
 * })
 * ```
 */
export const makeMockState = <S>(
  server: MockServer<S>,
  session: SessionHandle,
  local: S,
  overrides: MockStateOverrides<S> = {}
): MockState<S> => ({
  printLog: [],
  consoleOut: [],
  consoleIn: [[], ""],
  clock: DEFAULT_EPOCH,
  capturedFault: Option.none(),
  fileExists: true,
  fileFull: false,
  fileOut: [],
  fileIn: [],
  rng: mockGen(DEFAULT_SEED),
  ...overrides,
  server,
  session,
  local
})

/** Advance the clock by one logical tick. */
export const tick = <S>(state: MockState<S>): MockState<S> => ({
  ...state,
  clock: DateTime.add(state.clock, { seconds: 1 })
})

/** Everything written to stdout, oldest first, joined into one string. */
export const consoleTranscript = <S>(state: MockState<S>): string =>
  [...state.consoleOut].reverse().join("")

/** Written file payloads, oldest first. */
export const fileTranscript = <S>(state: MockState<S>): ReadonlyArray<Uint8Array> =>
  [...state.fileOut].reverse()
