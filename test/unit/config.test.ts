import { describe, it, expect } from "vitest"
import { ConfigError, ConfigProvider, DateTime, Effect } from "effect"
import { DEFAULT_EPOCH_ISO, DEFAULT_SEED, mockStateFromConfig, MockConfig } from "@simfx/core"
import { counterServer, expectEffectFailure, fixtureSession, runEffect } from "@simfx/test-utils"

const withEnv = (env: Record<string, string>) =>
  Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env))))

const fromEnv = (env: Record<string, string>) =>
  mockStateFromConfig(counterServer("http://counter"), fixtureSession("config"), 0).pipe(withEnv(env))

describe("MockConfig", () => {
  it("falls back to the defaults", async () => {
    const config = await runEffect(MockConfig.pipe(withEnv({})))

    expect(config.seed).toBe(DEFAULT_SEED)
    expect(DateTime.formatIso(config.epoch)).toBe(DEFAULT_EPOCH_ISO)
    expect(config.defaultLine).toBe("")
    expect(config.fileExists).toBe(true)
    expect(config.fileFull).toBe(false)
  })

  it("rejects an unparseable epoch", async () => {
    const error = await expectEffectFailure(MockConfig.pipe(withEnv({ SIMFX_MOCK_EPOCH: "not-a-date" })))

    expect(ConfigError.isConfigError(error)).toBe(true)
  })

  it("rejects a fractional seed", async () => {
    const error = await expectEffectFailure(MockConfig.pipe(withEnv({ SIMFX_MOCK_SEED: "1.5" })))

    expect(ConfigError.isConfigError(error)).toBe(true)
  })
})

describe("mockStateFromConfig", () => {
  it("builds the environment from configured values", async () => {
    const state = await runEffect(
      fromEnv({
        SIMFX_MOCK_SEED: "6",
        SIMFX_MOCK_EPOCH: "2024-01-01T00:00:00Z",
        SIMFX_MOCK_DEFAULT_LINE: "fallback",
        SIMFX_MOCK_FILE_EXISTS: "false",
        SIMFX_MOCK_FILE_FULL: "true"
      })
    )

    expect(state.rng.seed).toBe(6n)
    expect(DateTime.formatIso(state.clock)).toBe("2024-01-01T00:00:00.000Z")
    expect(state.consoleIn).toEqual([[], "fallback"])
    expect(state.fileExists).toBe(false)
    expect(state.fileFull).toBe(true)
    expect(state.local).toBe(0)
    expect(state.session).toEqual(fixtureSession("config"))
  })

  it("lets explicit overrides win", async () => {
    const state = await runEffect(
      mockStateFromConfig(counterServer("http://counter"), fixtureSession("config"), 0, {
        consoleIn: [["typed"], ""]
      }).pipe(withEnv({ SIMFX_MOCK_DEFAULT_LINE: "fallback" }))
    )

    expect(state.consoleIn).toEqual([["typed"], ""])
  })
})
