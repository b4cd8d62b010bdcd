import { Equal } from "effect"

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" &&
  value !== null &&
  (Object.getPrototypeOf(value) === Object.prototype || Object.getPrototypeOf(value) === null)

/**
 * Exact structural equality. Values implementing `Equal` compare with
 * `Equal.equals`; arrays, typed byte arrays and plain objects compare
 * element-wise; everything else compares with `===` (so `NaN` never equals itself).
 */
export const structurallyEqual = (x: unknown, y: unknown): boolean => {
  if (x === y) return true
  if (Equal.isEqual(x) || Equal.isEqual(y)) return Equal.equals(x, y)
  if (Array.isArray(x) && Array.isArray(y)) {
    return x.length === y.length && x.every((item, i) => structurallyEqual(item, y[i]))
  }
  if (x instanceof Uint8Array && y instanceof Uint8Array) {
    return x.length === y.length && x.every((byte, i) => byte === y[i])
  }
  if (isPlainObject(x) && isPlainObject(y)) {
    const keys = Object.keys(x)
    return (
      keys.length === Object.keys(y).length &&
      keys.every((key) => Object.hasOwn(y, key) && structurallyEqual(x[key], y[key]))
    )
  }
  return false
}

/** A string, or a list of elements. */
export type Sequence<A> = string | ReadonlyArray<A>

/**
 * Whether `needle` occurs contiguously inside `haystack`.
 */
export const isInfixOf = <A>(needle: Sequence<A>, haystack: Sequence<A>): boolean => {
  if (typeof needle === "string" && typeof haystack === "string") {
    return haystack.includes(needle)
  }
  const small: ReadonlyArray<unknown> = Array.from<unknown>(needle)
  const large: ReadonlyArray<unknown> = Array.from<unknown>(haystack)
  for (let start = 0; start + small.length <= large.length; start++) {
    if (small.every((item, i) => structurallyEqual(item, large[start + i]))) {
      return true
    }
  }
  return false
}

/**
 * Render a value for an assertion statement. Strings are quoted.
 */
export const show = (value: unknown): string => {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value)
    case "number":
    case "boolean":
      return String(value)
    case "bigint":
      return `${value}n`
    case "undefined":
    case "function":
    case "symbol":
      return String(value)
  }
  try {
    return (
      JSON.stringify(value, (_key, item: unknown) =>
        item instanceof Uint8Array ? Array.from(item) : item
      ) ?? String(value)
    )
  } catch {
    // circular structures
    return String(value)
  }
}
