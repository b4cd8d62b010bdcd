/**
 * Effect-TS test helpers for running and asserting on Effects.
 *
 * @module @simfx/test-utils/helpers/effect
 */

import {
  Cause,
  Chunk,
  Effect,
  Either,
  Exit,
  HashMap,
  List,
  Logger,
  LogLevel,
  Option,
  pipe
} from "effect"

// =============================================================================
// Types
// =============================================================================

/**
 * Options for running Effects in tests.
 */
export interface RunEffectOptions {
  /** Timeout in milliseconds (default: 5000) */
  timeout?: number
}

/**
 * Result of running an Effect with Either semantics.
 */
export type EffectResult<A, E> = Either.Either<A, E>

/** One captured log line. */
export interface CapturedLog {
  readonly level: string
  readonly message: string
  readonly annotations: Readonly<Record<string, unknown>>
  readonly spans: ReadonlyArray<string>
}

// A timeout is a defect, so the typed error channel stays `E`.
const withTimeout = <A, E>(
  effect: Effect.Effect<A, E>,
  { timeout = 5000 }: RunEffectOptions
): Effect.Effect<A, E> =>
  pipe(
    effect,
    Effect.timeoutFailCause({
      duration: timeout,
      onTimeout: () => Cause.die(new Error(`Effect timed out after ${timeout}ms`))
    })
  )

// =============================================================================
// Effect Runners
// =============================================================================

/**
 * Run an Effect and return the result.
 * Throws an error if the Effect fails.
 *
 * @example
 * ```typescript
 * const result = await runEffect(Effect.succeed(42))
 * expect(result).toBe(42)
 *
 * const suite = await runEffect(runLiveSuite(tree).pipe(Effect.provide(NodeLiveInterpreter)))
 * ```
 */
export const runEffect = async <A, E>(
  effect: Effect.Effect<A, E>,
  options: RunEffectOptions = {}
): Promise<A> => {
  const exit = await Effect.runPromiseExit(withTimeout(effect, options))

  if (Exit.isFailure(exit)) {
    throw new Error(`Effect failed:\n${Cause.pretty(exit.cause)}`)
  }

  return exit.value
}

/**
 * Run an Effect and expect it to fail.
 * Throws if the Effect succeeds.
 * Returns the failure cause for inspection.
 */
export const runEffectFail = async <A, E>(
  effect: Effect.Effect<A, E>,
  options: RunEffectOptions = {}
): Promise<Cause.Cause<E>> => {
  const exit = await Effect.runPromiseExit(withTimeout(effect, options))

  if (Exit.isSuccess(exit)) {
    throw new Error(
      `Expected Effect to fail, but it succeeded with: ${JSON.stringify(exit.value)}`
    )
  }

  return exit.cause
}

/**
 * Run an Effect and return an Either (success or failure).
 * Defects and interrupts are rethrown.
 *
 * @example
 * ```typescript
 * const result = await runEffectEither(assertSuitePassed(summary))
 * expect(Either.isLeft(result)).toBe(true)
 * ```
 */
export const runEffectEither = async <A, E>(
  effect: Effect.Effect<A, E>,
  options: RunEffectOptions = {}
): Promise<EffectResult<A, E>> => {
  const exit = await Effect.runPromiseExit(withTimeout(effect, options))

  if (Exit.isSuccess(exit)) {
    return Either.right(exit.value)
  }

  const failure = Cause.failureOption(exit.cause)
  if (Option.isSome(failure)) {
    return Either.left(failure.value)
  }

  const defect = Chunk.head(Cause.defects(exit.cause))
  if (Option.isSome(defect)) {
    throw defect.value
  }

  throw new Error(`Effect failed with unexpected cause: ${Cause.pretty(exit.cause)}`)
}

// =============================================================================
// Effect Assertions
// =============================================================================

/**
 * Assert that an Effect succeeds and optionally validate the result.
 * Returns the success value for further assertions.
 */
export const expectEffectSuccess = async <A, E>(
  effect: Effect.Effect<A, E>,
  validate?: (value: A) => void | Promise<void>
): Promise<A> => {
  const result = await runEffect(effect)

  if (validate) {
    await validate(result)
  }

  return result
}

/**
 * Assert that an Effect fails with a typed error.
 * Returns the error for further assertions.
 *
 * @example
 * ```typescript
 * const error = await expectEffectFailure(assertSuitePassed(summary), (err) => {
 *   expect(err._tag).toBe("SuiteFailedError")
 * })
 * ```
 */
export const expectEffectFailure = async <E, A = unknown>(
  effect: Effect.Effect<A, E>,
  validate?: (error: E) => void | Promise<void>
): Promise<E> => {
  const cause = await runEffectFail(effect)

  const failure = Cause.failureOption(cause)
  if (Option.isNone(failure)) {
    throw new Error(`Expected a typed failure but got: ${Cause.pretty(cause)}`)
  }

  if (validate) {
    await validate(failure.value)
  }

  return failure.value
}

// =============================================================================
// Log capture
// =============================================================================

const renderMessage = (message: unknown): string => {
  const parts: ReadonlyArray<unknown> = Array.isArray(message) ? message : [message]
  return parts.map((part) => (typeof part === "string" ? part : String(part))).join(" ")
}

/**
 * Run an Effect with the default logger replaced by one that records every
 * line, at every level, and return the result together with the lines.
 *
 * @example
 * ```typescript
 * const [result, logs] = await runEffect(captureLogs(runMockSuite(tree, state)))
 * expect(logs.map((log) => log.level)).toEqual(["INFO"])
 * ```
 */
export const captureLogs = <A, E>(
  effect: Effect.Effect<A, E>
): Effect.Effect<readonly [A, ReadonlyArray<CapturedLog>], E> =>
  Effect.suspend(() => {
    const lines: CapturedLog[] = []
    const logger = Logger.make(({ logLevel, message, annotations, spans }) => {
      lines.push({
        level: logLevel.label,
        message: renderMessage(message),
        annotations: Object.fromEntries(HashMap.toEntries(annotations)),
        spans: List.toArray(spans).map((span) => span.label)
      })
    })
    return effect.pipe(
      Effect.provide(Logger.replace(Logger.defaultLogger, logger)),
      Logger.withMinimumLogLevel(LogLevel.All),
      Effect.map((result) => [result, lines] as const)
    )
  })
