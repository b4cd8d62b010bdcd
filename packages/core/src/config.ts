/**
 * Mock environment configuration, read through Effect `Config`.
 *
 * | Variable | Default |
 * |---|---|
 * | SIMFX_MOCK_SEED | 6171 |
 * | SIMFX_MOCK_EPOCH | 1858-11-17T00:00:00.000Z |
 * | SIMFX_MOCK_DEFAULT_LINE | "" |
 * | SIMFX_MOCK_FILE_EXISTS | true |
 * | SIMFX_MOCK_FILE_FULL | false |
 */

import { Config, ConfigError, DateTime, Effect, Either, Option } from "effect"
import type { SessionHandle } from "@simfx/types"
import { DEFAULT_SEED, mockGen } from "./mock/mock-gen.js"
import {
  DEFAULT_EPOCH_ISO,
  makeMockState,
  type MockServer,
  type MockState,
  type MockStateOverrides
} from "./mock/mock-state.js"

export interface MockConfig {
  readonly seed: number
  readonly epoch: DateTime.Utc
  readonly defaultLine: string
  readonly fileExists: boolean
  readonly fileFull: boolean
}

const epochConfig = Config.string("SIMFX_MOCK_EPOCH").pipe(
  Config.withDefault(DEFAULT_EPOCH_ISO),
  Config.mapOrFail((raw) =>
    Option.match(DateTime.make(raw), {
      onNone: () =>
        Either.left(ConfigError.InvalidData(["SIMFX_MOCK_EPOCH"], `Invalid timestamp: ${raw}`)),
      onSome: (dateTime) => Either.right(DateTime.toUtc(dateTime))
    })
  )
)

const seedConfig = Config.integer("SIMFX_MOCK_SEED").pipe(
  Config.withDefault(DEFAULT_SEED),
  Config.validate<number>({
    message: "Expected a safe integer",
    validation: Number.isSafeInteger
  })
)

export const MockConfig: Config.Config<MockConfig> = Config.all({
  seed: seedConfig,
  epoch: epochConfig,
  defaultLine: Config.string("SIMFX_MOCK_DEFAULT_LINE").pipe(Config.withDefault("")),
  fileExists: Config.boolean("SIMFX_MOCK_FILE_EXISTS").pipe(Config.withDefault(true)),
  fileFull: Config.boolean("SIMFX_MOCK_FILE_FULL").pipe(Config.withDefault(false))
})

/**
 * Build a mock environment from configuration. Explicit overrides win over
 * configured values.
 */
export const mockStateFromConfig = <S>(
  server: MockServer<S>,
  session: SessionHandle,
  local: S,
  overrides: MockStateOverrides<S> = {}
): Effect.Effect<MockState<S>, ConfigError.ConfigError> =>
  Effect.gen(function* () {
    const config = yield* MockConfig
    yield* Effect.logDebug(`Mock environment: seed=${config.seed} epoch=${DateTime.formatIso(config.epoch)}`)
    return makeMockState(server, session, local, {
      rng: mockGen(config.seed),
      clock: config.epoch,
      consoleIn: [[], config.defaultLine],
      fileExists: config.fileExists,
      fileFull: config.fileFull,
      ...overrides
    })
  })
