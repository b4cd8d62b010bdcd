/**
 * Capability interfaces
 *
 * Code under test is written against an `Interpreter<F>`, where `F` is the
 * type lambda of the program type. The mock interpreter (`MockIO`) and the
 * live interpreter (`Effect`) both satisfy it, so the same program runs in a
 * deterministic simulation or against the real world.
 *
 * @example
 * ```typescript
 * const greet = <F extends TypeLambda>(I: Interpreter<F>) =>
 *   I.flatMap(I.console.getLine("stdin"), (name) =>
 *     I.console.putStrLn("stdout", `Hello, ${name}`)
 *   )
 * ```
 */

import { List, Option } from "effect"
import type { DateTime, Duration, Either } from "effect"
import type { Kind, TypeLambda } from "effect/HKT"
import type {
  Handle,
  HttpRequestOptions,
  HttpResponse,
  SessionHandle
} from "@simfx/types"
import type { Fault, TransportFault } from "./errors.js"

/** A computation in program type `F` producing an `A`. */
export type Program<F extends TypeLambda, A> = Kind<F, never, never, Fault, A>

/** What an HTTP call yields: a transport fault or a structured response. */
export type HttpResult = Either.Either<HttpResponse, TransportFault>

export interface ConsoleCapability<F extends TypeLambda> {
  readonly stdin: Program<F, Handle>
  readonly stdout: Program<F, Handle>
  readonly stderr: Program<F, Handle>
  readonly getEcho: (handle: Handle) => Program<F, boolean>
  readonly setEcho: (handle: Handle, echo: boolean) => Program<F, void>
  readonly getChar: (handle: Handle) => Program<F, string>
  readonly getLine: (handle: Handle) => Program<F, string>
  readonly putChar: (handle: Handle, char: string) => Program<F, void>
  readonly putStr: (handle: Handle, text: string) => Program<F, void>
  /** `putStr` followed by a line terminator. */
  readonly putStrLn: (handle: Handle, text: string) => Program<F, void>
  readonly flush: (handle: Handle) => Program<F, void>
}

export interface TimerCapability<F extends TypeLambda> {
  readonly sleep: (duration: Duration.DurationInput) => Program<F, void>
  readonly now: Program<F, DateTime.Utc>
}

export interface TryCapability<F extends TypeLambda> {
  /**
   * Run a program and turn a fault it raised into a `Left`.
   */
  readonly attempt: <A>(program: Program<F, A>) => Program<F, Either.Either<A, Fault>>
}

export interface FilesCapability<F extends TypeLambda> {
  readonly exists: (path: string) => Program<F, boolean>
  /** Fails with NotFoundFault or EndOfInputFault. */
  readonly readFile: (path: string) => Program<F, Uint8Array>
  /** Fails with StorageFullFault. */
  readonly writeFile: (path: string, contents: Uint8Array) => Program<F, void>
}

export interface RandomCapability<F extends TypeLambda> {
  readonly nextInt: Program<F, number>
  /** Uniform draw from the closed interval [lo, hi]. */
  readonly nextIntBetween: (lo: number, hi: number) => Program<F, number>
}

export interface HttpCapability<F extends TypeLambda> {
  readonly get: (url: string, options?: HttpRequestOptions) => Program<F, HttpResult>
  readonly post: (
    url: string,
    payload: Uint8Array,
    options?: HttpRequestOptions
  ) => Program<F, HttpResult>
  readonly delete: (url: string, options?: HttpRequestOptions) => Program<F, HttpResult>
  readonly newSession: Program<F, SessionHandle>
}

/**
 * Sequencing primitives plus every capability, for one program type.
 */
export interface Interpreter<F extends TypeLambda> {
  readonly succeed: <A>(value: A) => Program<F, A>
  readonly flatMap: <A, B>(
    self: Program<F, A>,
    f: (a: A) => Program<F, B>
  ) => Program<F, B>
  readonly map: <A, B>(self: Program<F, A>, f: (a: A) => B) => Program<F, B>
  readonly andThen: <A, B>(self: Program<F, A>, next: Program<F, B>) => Program<F, B>

  readonly console: ConsoleCapability<F>
  readonly timer: TimerCapability<F>
  readonly try: TryCapability<F>
  readonly files: FilesCapability<F>
  readonly random: RandomCapability<F>
  readonly http: HttpCapability<F>
}

// =============================================================================
// Generic helpers
// =============================================================================

/**
 * Run `f` over each item in order and collect the results.
 */
export const forEach = <F extends TypeLambda, A, B>(
  I: Interpreter<F>,
  items: ReadonlyArray<A>,
  f: (item: A) => Program<F, B>
): Program<F, ReadonlyArray<B>> => {
  // results accumulate newest-first in a persistent list, reversed once at the end
  const collected = Option.getOrElse(
    items.reduce<Option.Option<Program<F, List.List<B>>>>(
      (acc, item) =>
        Option.match(acc, {
          // the first item is not preceded by a sequencing step
          onNone: () => Option.some(I.map(f(item), (result): List.List<B> => List.of(result))),
          onSome: (program) =>
            Option.some(
              I.flatMap(program, (done) =>
                I.map(f(item), (result): List.List<B> => List.prepend(done, result))
              )
            )
        }),
      Option.none()
    ),
    () => I.succeed<List.List<B>>(List.empty())
  )
  return I.map(collected, (results): ReadonlyArray<B> => List.toArray(List.reverse(results)))
}

/** Read one line from standard input. */
export const readLine = <F extends TypeLambda>(I: Interpreter<F>): Program<F, string> =>
  I.flatMap(I.console.stdin, (handle) => I.console.getLine(handle))

/** Write one line to standard output. */
export const printLine = <F extends TypeLambda>(
  I: Interpreter<F>,
  text: string
): Program<F, void> =>
  I.flatMap(I.console.stdout, (handle) => I.console.putStrLn(handle, text))
