import { defineConfig } from "vitest/config"
import { fileURLToPath } from "node:url"
import { dirname, resolve } from "node:path"

const EFFECT_INFO_LOG_RE = /^timestamp=\d{4}-\d{2}-\d{2}T.* level=INFO fiber=#\d+ message=/
const ROOT_DIR = dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@simfx\/core$/,
        replacement: resolve(ROOT_DIR, "packages/core/src/index.ts"),
      },
      {
        find: /^@simfx\/test-utils$/,
        replacement: resolve(ROOT_DIR, "packages/test-utils/src/index.ts"),
      },
      {
        find: /^@simfx\/types$/,
        replacement: resolve(ROOT_DIR, "packages/types/src/index.ts"),
      },
    ],
  },
  test: {
    include: [
      "test/**/*.test.ts",
      "packages/*/src/**/*.test.ts"
    ],
    environment: "node",
    testTimeout: 10000,
    pool: "forks",
    isolate: true,
    onConsoleLog(log, type) {
      if (type === "stdout" && EFFECT_INFO_LOG_RE.test(log)) {
        return false
      }
    },
  }
})
