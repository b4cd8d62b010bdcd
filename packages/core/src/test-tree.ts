/**
 * Test trees
 *
 * A finite tree of test cases, groups and labels. Labels extend the context
 * path seen by every assertion made underneath them.
 *
 * @example
 * ```typescript
 * const suite = testGroup([
 *   testLabel("login", testCase((ctx) => M.map(login, (ok) => [ctx.isTrue(ok, "can log in")]))),
 *   testCase((ctx) => M.succeed([ctx.success("root case ran")]))
 * ])
 * const assertions = M.evaluate(runTestTree(M, suite), state)
 * ```
 *
 * @module @simfx/core/test-tree
 */

import type { TypeLambda } from "effect/HKT"
import type { Assertion } from "@simfx/types"
import { forEach, type Interpreter, type Program } from "./capabilities.js"
import { AssertContext } from "./assert/context.js"

export interface TestCaseNode<U> {
  readonly _tag: "TestCase"
  readonly test: U
}

export interface TestGroupNode<U> {
  readonly _tag: "TestGroup"
  readonly children: ReadonlyArray<TestTree<U>>
}

export interface TestLabelNode<U> {
  readonly _tag: "TestLabel"
  readonly label: string
  readonly tree: TestTree<U>
}

export type TestTree<U> = TestCaseNode<U> | TestGroupNode<U> | TestLabelNode<U>

/** A test case: a program producing assertions, given the context it runs in. */
export type TestCase<F extends TypeLambda> = (
  context: AssertContext
) => Program<F, ReadonlyArray<Assertion>>

export const testCase = <U>(test: U): TestTree<U> => ({ _tag: "TestCase", test })

export const testGroup = <U>(children: ReadonlyArray<TestTree<U>>): TestTree<U> => ({
  _tag: "TestGroup",
  children
})

export const testLabel = <U>(label: string, tree: TestTree<U>): TestTree<U> => ({
  _tag: "TestLabel",
  label,
  tree
})

/**
 * Run every case in order and collect their assertions.
 *
 * Groups never short-circuit: a failing case only contributes failing
 * assertions. The context is passed by value, so a label's name is visible
 * only inside its subtree.
 */
export const runTestTree = <F extends TypeLambda>(
  I: Interpreter<F>,
  tree: TestTree<TestCase<F>>,
  context: AssertContext = AssertContext.root
): Program<F, ReadonlyArray<Assertion>> => {
  switch (tree._tag) {
    case "TestCase":
      return tree.test(context)
    case "TestGroup":
      return I.map(
        forEach(I, tree.children, (child) => runTestTree(I, child, context)),
        (results): ReadonlyArray<Assertion> => results.flat()
      )
    case "TestLabel":
      return runTestTree(I, tree.tree, context.nest(tree.label))
  }
}

/** Number of cases in a tree. */
export const countCases = <U>(tree: TestTree<U>): number => {
  switch (tree._tag) {
    case "TestCase":
      return 1
    case "TestGroup":
      return tree.children.reduce((sum, child) => sum + countCases(child), 0)
    case "TestLabel":
      return countCases(tree.tree)
  }
}
