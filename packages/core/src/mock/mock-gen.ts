import { InvalidRangeError, InvalidSeedError } from "../errors.js"

/** Seed used when a mock environment is built without configuration. */
export const DEFAULT_SEED = 6171

/**
 * Reproducible number generator for the mock interpreter.
 *
 * Not random in any useful sense: from seed k it emits |k| and moves to
 * k / 2 when k is even, 3k + 1 otherwise. Two generators built from the same
 * seed produce the same sequence.
 *
 * The state is a signed 64-bit integer: successors wrap around on overflow,
 * so the recurrence stays exact however far it climbs. Draws are returned as
 * numbers and are exact while |k| stays within the safe integer range.
 */
export interface MockGen {
  readonly seed: bigint
}

const wrap = (k: bigint): bigint => BigInt.asIntN(64, k)

const abs = (k: bigint): bigint => (k < 0n ? -k : k)

/**
 * Create a generator. Throws InvalidSeedError unless the seed is a safe
 * integer or a bigint within the signed 64-bit range.
 */
export const mockGen = (seed: number | bigint): MockGen => {
  if (typeof seed === "bigint") {
    if (wrap(seed) !== seed) {
      throw new InvalidSeedError({ seed })
    }
    return { seed }
  }
  if (!Number.isSafeInteger(seed)) {
    throw new InvalidSeedError({ seed })
  }
  return { seed: BigInt(seed) }
}

/** Draw one value and the successor generator. */
export const next = (gen: MockGen): readonly [number, MockGen] => {
  const k = gen.seed
  return [Number(abs(k)), { seed: k % 2n === 0n ? k / 2n : wrap(3n * k + 1n) }]
}

/** Split into two generators whose states differ: (k, k + 1). */
export const split = (gen: MockGen): readonly [MockGen, MockGen] => [
  { seed: gen.seed },
  { seed: wrap(gen.seed + 1n) }
]

/**
 * Draw one value in the closed interval [lo, hi]. Bounds are swapped when
 * lo > hi. Throws InvalidRangeError unless both bounds are safe integers.
 */
export const nextBetween = (
  gen: MockGen,
  lo: number,
  hi: number
): readonly [number, MockGen] => {
  if (!Number.isSafeInteger(lo) || !Number.isSafeInteger(hi)) {
    throw new InvalidRangeError({ lo, hi })
  }
  const low = BigInt(Math.min(lo, hi))
  const high = BigInt(Math.max(lo, hi))
  const k = gen.seed
  const [, successor] = next(gen)
  // computed in bigint: the result never leaves [low, high]
  return [Number(low + (abs(k) % (high - low + 1n))), successor]
}

/** Draw `count` values in order, returning them with the final generator. */
export const take = (
  gen: MockGen,
  count: number
): readonly [ReadonlyArray<number>, MockGen] => {
  const values: number[] = []
  let current = gen
  for (let i = 0; i < count; i++) {
    const [value, successor] = next(current)
    values.push(value)
    current = successor
  }
  return [values, current]
}
