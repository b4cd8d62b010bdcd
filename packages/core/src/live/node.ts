/**
 * Node.js wiring for the live interpreter.
 *
 * @module @simfx/core/live/node
 */

import { Layer } from "effect"
import { NodeFileSystem, NodeHttpClient, NodeTerminal } from "@effect/platform-node"
import { LiveInterpreterLive } from "./live-interpreter.js"

/**
 * Live interpreter backed by the Node file system, HTTP client and terminal.
 */
export const NodeLiveInterpreter = LiveInterpreterLive.pipe(
  Layer.provide(
    Layer.mergeAll(NodeFileSystem.layer, NodeHttpClient.layer, NodeTerminal.layer)
  )
)
