/**
 * Fixture ID generation utilities for deterministic test data.
 *
 * @module @simfx/test-utils/fixtures
 */

import * as crypto from "crypto"
import { sessionHandle, type SessionHandle } from "@simfx/types"

/**
 * Generate deterministic fixture ID from name.
 * Same name always produces same ID across test runs.
 *
 * @example
 * fixtureId('checkout-flow') // -> 'fx-a1b2c3d4'
 * fixtureId('checkout-flow') // -> 'fx-a1b2c3d4' (same)
 */
export const fixtureId = (name: string): string => {
  const hash = crypto.createHash("sha256").update(name).digest("hex")
  return `fx-${hash.slice(0, 8)}`
}

/**
 * Generate fixture ID with namespace to avoid collisions.
 */
export const namespacedFixtureId = (namespace: string, name: string): string => {
  return fixtureId(`${namespace}::${name}`)
}

/**
 * Generate sequential IDs within a namespace.
 */
export const sequentialFixtureIds = (namespace: string, count: number): string[] => {
  return Array.from({ length: count }, (_, i) =>
    namespacedFixtureId(namespace, `${i + 1}`)
  )
}

/**
 * Deterministic session handle for a named scenario.
 *
 * @example
 * fixtureSession('login') // -> { _tag: 'SessionHandle', id: 'session-fx-...' }
 */
export const fixtureSession = (name: string): SessionHandle =>
  sessionHandle(`session-${namespacedFixtureId("session", name)}`)
