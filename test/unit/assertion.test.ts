import { describe, it, expect } from "vitest"
import { Option } from "effect"
import {
  AssertContext,
  assertEqual,
  assertFailure,
  assertFalse,
  assertIsNamedSubstring,
  assertIsNotNamedSubstring,
  assertIsNotSubstring,
  assertIsSubstring,
  assertNotEqual,
  assertSuccess,
  assertSuccessIf,
  assertTrue,
  isInfixOf,
  show,
  showAssertion,
  structurallyEqual
} from "@simfx/core"

describe("assertSuccessIf", () => {
  it.each([true, false])("records the predicate %s and keeps the text verbatim", (predicate) => {
    const assertion = assertSuccessIf(predicate, "the statement", "the comment", "ctx")

    expect(assertion).toEqual({
      statement: "the statement",
      justification: "the comment",
      context: "ctx",
      outcome: predicate ? "pass" : "fail"
    })
  })

  it("defaults to the root context", () => {
    expect(assertSuccessIf(true, "s", "c").context).toBe("")
  })
})

describe("derived constructors", () => {
  it("always pass or always fail", () => {
    expect(assertSuccess("reached").statement).toBe("Success!")
    expect(assertSuccess("reached").outcome).toBe("pass")
    expect(assertFailure("unreachable").statement).toBe("Failure :(")
    expect(assertFailure("unreachable").outcome).toBe("fail")
  })

  it("describes boolean checks", () => {
    expect(assertTrue(true, "c").statement).toBe("true is true")
    expect(assertTrue(false, "c").outcome).toBe("fail")
    expect(assertFalse(true, "c").statement).toBe("true is false")
    expect(assertFalse(false, "c").outcome).toBe("pass")
  })

  it("describes equality", () => {
    const unequal = assertEqual(1, 2, "numbers agree")

    expect(unequal.statement).toBe("1 is equal to 2")
    expect(unequal.outcome).toBe("fail")
    expect(assertNotEqual("a", "b", "c").statement).toBe('"a" is not equal to "b"')
    expect(assertNotEqual("a", "b", "c").outcome).toBe("pass")
  })

  it("compares plain data structurally", () => {
    const assertion = assertEqual({ a: [1, 2] }, { a: [1, 2] }, "same shape")

    expect(assertion.outcome).toBe("pass")
    expect(assertion.statement).toBe('{"a":[1,2]} is equal to {"a":[1,2]}')
  })

  it("describes substring checks on strings and lists", () => {
    expect(assertIsSubstring("ab", "cab", "c").statement).toBe('"ab" is a substring of "cab"')
    expect(assertIsSubstring("ab", "cab", "c").outcome).toBe("pass")
    expect(assertIsSubstring([2, 3], [1, 2, 3], "c").statement).toBe("[2,3] is a substring of [1,2,3]")
    expect(assertIsSubstring([3, 2], [1, 2, 3], "c").outcome).toBe("fail")
    expect(assertIsNotSubstring("zz", "cab", "c").statement).toBe('"zz" is not a substring of "cab"')
    expect(assertIsNotSubstring("zz", "cab", "c").outcome).toBe("pass")
  })

  it("names large haystacks instead of rendering them", () => {
    const page: readonly [string, string] = ["<html>welcome back</html>", "the landing page"]

    expect(assertIsNamedSubstring("welcome", page, "c").statement).toBe(
      '"welcome" is a substring of the landing page'
    )
    expect(assertIsNamedSubstring("welcome", page, "c").outcome).toBe("pass")
    expect(assertIsNotNamedSubstring("error", page, "c").statement).toBe(
      '"error" is not a substring of the landing page'
    )
    expect(assertIsNotNamedSubstring("welcome", page, "c").outcome).toBe("fail")
  })
})

describe("structural equality", () => {
  it("uses Equal for Effect data", () => {
    expect(structurallyEqual(Option.some(1), Option.some(1))).toBe(true)
    expect(structurallyEqual(Option.some(1), Option.none())).toBe(false)
  })

  it("is exact", () => {
    expect(structurallyEqual(Number.NaN, Number.NaN)).toBe(false)
    expect(structurallyEqual(0.1 + 0.2, 0.3)).toBe(false)
    expect(structurallyEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false)
  })

  it("compares byte arrays element-wise", () => {
    expect(structurallyEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true)
    expect(structurallyEqual(new Uint8Array([1, 2]), new Uint8Array([2, 1]))).toBe(false)
  })

  it("finds contiguous runs", () => {
    expect(isInfixOf([], [1])).toBe(true)
    expect(isInfixOf([1, 3], [1, 2, 3])).toBe(false)
    expect(isInfixOf([{ id: 1 }], [{ id: 0 }, { id: 1 }])).toBe(true)
  })
})

describe("show", () => {
  it("quotes strings and renders other values", () => {
    expect(show("x")).toBe('"x"')
    expect(show(3)).toBe("3")
    expect(show(10n)).toBe("10n")
    expect(show(undefined)).toBe("undefined")
    expect(show(null)).toBe("null")
    expect(show(new Uint8Array([7, 8]))).toBe("[7,8]")
  })
})

describe("showAssertion", () => {
  it("renders failures in red with context and comment", () => {
    const rendered = showAssertion(assertEqual(1, 2, "numbers match", "A/B"))

    expect(rendered).toBe(
      "\x1b[1;31mInvalid Assertion\x1b[0;39;49m in A/B \nassertion: 1 is equal to 2 \ncomment: numbers match"
    )
  })

  it("renders passes in green", () => {
    expect(showAssertion(assertSuccess("done", "root"))).toBe(
      "\x1b[1;32mValid Assertion\x1b[0;39;49m in root \nassertion: Success! \ncomment: done"
    )
  })
})

describe("AssertContext", () => {
  it("nests labels into a path without changing the parent", () => {
    const a = AssertContext.root.nest("A")
    const b = a.nest("B")

    expect(AssertContext.root.name).toBe("")
    expect(a.name).toBe("A")
    expect(b.name).toBe("A/B")
    expect(b.path).toEqual(["A", "B"])
  })

  it("stamps its name on every assertion", () => {
    const ctx = AssertContext.root.nest("login")
    const { equal } = ctx

    expect(ctx.isTrue(true, "c").context).toBe("login")
    expect(ctx.isSubstring("in", "login", "c").context).toBe("login")
    expect(equal(1, 1, "detached method").context).toBe("login")
  })
})
