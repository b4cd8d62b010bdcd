/**
 * Live interpreter
 *
 * Runs capability programs as Effects against the platform services:
 * `Terminal` for the console, `FileSystem` for files, `HttpClient` for HTTP,
 * and Effect's default `Clock`/`Random` for the timer and random source.
 * Platform failures are mapped onto the same fault types the mock raises.
 *
 * @module @simfx/core/live/live-interpreter
 */

import { Context, DateTime, Effect, Layer, Option, Random, Ref } from "effect"
import {
  Cookies,
  FileSystem,
  HttpBody,
  HttpClient,
  HttpClientRequest,
  Terminal
} from "@effect/platform"
import type { PlatformError } from "@effect/platform/Error"
import {
  sessionHandle,
  type Handle,
  type HttpRequestOptions,
  type HttpResponse,
  type SessionHandle
} from "@simfx/types"
import type { HttpResult, Interpreter } from "../capabilities.js"
import {
  EndOfInputFault,
  IoFault,
  NotFoundFault,
  StorageFullFault,
  TransportFault,
  type Fault
} from "../errors.js"

export type LiveInterpreterShape = Interpreter<Effect.EffectTypeLambda>

/**
 * Platform services the live interpreter delegates to.
 */
export interface LiveDependencies {
  readonly fileSystem: FileSystem.FileSystem
  readonly httpClient: HttpClient.HttpClient
  /** Standard input and standard output. */
  readonly terminal: Pick<Terminal.Terminal, "readLine" | "display">
  /** Standard error, which `Terminal` does not cover. */
  readonly errorOutput: (text: string) => Effect.Effect<void>
}

/**
 * Map a platform error onto a fault for the given path.
 */
export const platformErrorToFault = (path: string, error: PlatformError): Fault => {
  if (error._tag === "SystemError") {
    switch (error.reason) {
      case "NotFound":
        return new NotFoundFault({ path })
      case "UnexpectedEof":
        return new EndOfInputFault({ path })
      case "WriteZero":
        return new StorageFullFault({ path })
    }
  }
  return new IoFault({ path, reason: error.message })
}

/**
 * Build a live interpreter from already-resolved platform services.
 */
export const makeLiveInterpreter = (
  deps: LiveDependencies
): Effect.Effect<LiveInterpreterShape> =>
  Effect.gen(function* () {
    const echo = yield* Ref.make(true)
    const sessionCount = yield* Ref.make(0)
    // cookie jar per session handle, released with the handle
    const jars = new WeakMap<SessionHandle, Ref.Ref<Cookies.Cookies>>()

    const putStr = (handle: Handle, text: string): Effect.Effect<void, Fault> => {
      switch (handle) {
        case "stdout":
          return deps.terminal
            .display(text)
            .pipe(Effect.mapError((error) => platformErrorToFault(handle, error)))
        case "stderr":
          return deps.errorOutput(text)
        case "stdin":
          return Effect.fail(new IoFault({ path: handle, reason: "handle is not writable" }))
      }
    }

    const getLine = (handle: Handle): Effect.Effect<string, Fault> =>
      handle === "stdin"
        ? deps.terminal.readLine.pipe(
            Effect.mapError(() => new EndOfInputFault({ path: handle }))
          )
        : Effect.fail(new IoFault({ path: handle, reason: "handle is not readable" }))

    const clientFor = (options?: HttpRequestOptions): HttpClient.HttpClient =>
      Option.fromNullable(options?.session).pipe(
        Option.flatMap((session) => Option.fromNullable(jars.get(session))),
        Option.match({
          onNone: () => deps.httpClient,
          onSome: (jar) => HttpClient.withCookiesRef(deps.httpClient, jar)
        })
      )

    const send = (
      method: string,
      request: HttpClientRequest.HttpClientRequest,
      options?: HttpRequestOptions
    ): Effect.Effect<HttpResult> =>
      clientFor(options).execute(request).pipe(
        Effect.flatMap((response) =>
          Effect.map(
            response.arrayBuffer,
            (buffer): HttpResponse => ({
              status: response.status,
              headers: Object.fromEntries(Object.entries(response.headers)),
              body: new Uint8Array(buffer)
            })
          )
        ),
        Effect.scoped,
        Effect.tap((response) => Effect.logDebug(`${method} ${request.url} -> ${response.status}`)),
        Effect.mapError((error) => new TransportFault({ url: request.url, reason: error.message })),
        Effect.tapError((fault) => Effect.logWarning(fault.message)),
        Effect.either,
        Effect.annotateLogs({ method, url: request.url })
      )

    const requestOptions = (options?: HttpRequestOptions) => ({
      headers: options?.headers ?? {}
    })

    const newSession = Effect.gen(function* () {
      const id = yield* Ref.updateAndGet(sessionCount, (count) => count + 1)
      const jar = yield* Ref.make(Cookies.empty)
      const handle = sessionHandle(`live-session-${id}`)
      jars.set(handle, jar)
      return handle
    })

    const interpreter: LiveInterpreterShape = {
      succeed: (value) => Effect.succeed(value),
      flatMap: (self, f) => Effect.flatMap(self, f),
      map: (self, f) => Effect.map(self, f),
      andThen: (self, that) => Effect.zipRight(self, that),

      console: {
        stdin: Effect.succeed<Handle>("stdin"),
        stdout: Effect.succeed<Handle>("stdout"),
        stderr: Effect.succeed<Handle>("stderr"),
        getEcho: () => Ref.get(echo),
        setEcho: (_handle, flag) => Ref.set(echo, flag),
        // terminals deliver input line by line; take the first character
        getChar: (handle) => Effect.map(getLine(handle), (line) => line.charAt(0) || "\n"),
        getLine,
        putChar: putStr,
        putStr,
        putStrLn: (handle, text) => putStr(handle, `${text}\n`),
        flush: () => Effect.void
      },

      timer: {
        sleep: (duration) => Effect.sleep(duration),
        now: DateTime.now
      },

      try: {
        attempt: (program) => Effect.either(program)
      },

      files: {
        exists: (path) =>
          deps.fileSystem
            .exists(path)
            .pipe(Effect.mapError((error) => platformErrorToFault(path, error))),
        readFile: (path) =>
          deps.fileSystem
            .readFile(path)
            .pipe(Effect.mapError((error) => platformErrorToFault(path, error))),
        writeFile: (path, contents) =>
          deps.fileSystem
            .writeFile(path, contents)
            .pipe(Effect.mapError((error) => platformErrorToFault(path, error)))
      },

      random: {
        nextInt: Random.nextInt,
        nextIntBetween: (lo, hi) =>
          Random.nextIntBetween(Math.min(lo, hi), Math.max(lo, hi) + 1)
      },

      http: {
        get: (url, options) =>
          send("GET", HttpClientRequest.get(url, requestOptions(options)), options),
        post: (url, payload, options) =>
          send(
            "POST",
            HttpClientRequest.post(url, {
              ...requestOptions(options),
              body: HttpBody.uint8Array(payload)
            }),
            options
          ),
        delete: (url, options) =>
          send("DELETE", HttpClientRequest.del(url, requestOptions(options)), options),
        newSession
      }
    }

    return interpreter
  })

// =============================================================================
// Layer
// =============================================================================

export class LiveInterpreter extends Context.Tag("LiveInterpreter")<
  LiveInterpreter,
  LiveInterpreterShape
>() {}

/**
 * Live interpreter built from the platform services in context.
 */
export const LiveInterpreterLive = Layer.effect(
  LiveInterpreter,
  Effect.gen(function* () {
    const fileSystem = yield* FileSystem.FileSystem
    const httpClient = yield* HttpClient.HttpClient
    const terminal = yield* Terminal.Terminal
    yield* Effect.logDebug("LiveInterpreter: platform services resolved")
    return yield* makeLiveInterpreter({
      fileSystem,
      httpClient,
      terminal,
      errorOutput: (text) =>
        Effect.sync(() => {
          process.stderr.write(text)
        })
    })
  })
)
