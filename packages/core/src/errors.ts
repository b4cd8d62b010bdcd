import { Data } from "effect"

// =============================================================================
// Simulated faults
// =============================================================================

export class EndOfInputFault extends Data.TaggedError("EndOfInputFault")<{
  readonly path: string
}> {
  get message() {
    return `End of input: ${this.path}`
  }
}

export class NotFoundFault extends Data.TaggedError("NotFoundFault")<{
  readonly path: string
}> {
  get message() {
    return `No such file or directory: ${this.path}`
  }
}

export class StorageFullFault extends Data.TaggedError("StorageFullFault")<{
  readonly path: string
}> {
  get message() {
    return `No space left on device: ${this.path}`
  }
}

export class TransportFault extends Data.TaggedError("TransportFault")<{
  readonly url: string
  readonly reason: string
}> {
  get message() {
    return `Transport error for ${this.url}: ${this.reason}`
  }
}

/**
 * Any other I/O failure. Only the live interpreter produces these.
 */
export class IoFault extends Data.TaggedError("IoFault")<{
  readonly path: string
  readonly reason: string
}> {
  get message() {
    return `I/O error at ${this.path}: ${this.reason}`
  }
}

/** Faults carried by the simulated-fault channel. */
export type Fault =
  | EndOfInputFault
  | NotFoundFault
  | StorageFullFault
  | TransportFault
  | IoFault

// =============================================================================
// Framework errors
// =============================================================================

export class InvalidSeedError extends Data.TaggedError("InvalidSeedError")<{
  readonly seed: number | bigint
}> {
  get message() {
    const expected =
      typeof this.seed === "bigint" ? "a signed 64-bit integer" : "a safe integer"
    return `Invalid generator seed: ${this.seed} (expected ${expected})`
  }
}

export class InvalidRangeError extends Data.TaggedError("InvalidRangeError")<{
  readonly lo: number
  readonly hi: number
}> {
  get message() {
    return `Invalid interval [${this.lo}, ${this.hi}] (expected safe integer bounds)`
  }
}

export class SuiteFailedError extends Data.TaggedError("SuiteFailedError")<{
  readonly total: number
  readonly failureCount: number
}> {
  get message() {
    return `${this.failureCount} of ${this.total} assertions failed`
  }
}
