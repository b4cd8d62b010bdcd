/**
 * MockIO - the state-threading program type of the mock interpreter.
 *
 * A `MockIO<S, A>` is a pure function from an environment to a result and a
 * successor environment. Sequencing two computations advances the simulated
 * clock by exactly one tick between them, so timestamps observed by a program
 * follow its step order. Evaluation does not grow the call stack with the
 * length of a program.
 *
 * @module @simfx/core/mock/mock-io
 */

import { Option } from "effect"
import type { TypeLambda } from "effect/HKT"
import type { Fault } from "../errors.js"
import { tick, type MockState } from "./mock-state.js"

/**
 * One sequencing step handed to the `gen` driver.
 */
export interface MockStep<S> {
  readonly execute: (state: MockState<S>) => MockState<S>
}

/** Holds the result of a step until the generator resumes. */
class StepSlot<S, A> implements MockStep<S> {
  private result: Option.Option<A> = Option.none()

  constructor(private readonly io: MockIO<S, A>) {}

  execute(state: MockState<S>): MockState<S> {
    const [value, successor] = this.io.run(state)
    this.result = Option.some(value)
    return successor
  }

  value(): A {
    return Option.getOrThrowWith(
      this.result,
      () => new Error("MockIO step resumed before it was executed")
    )
  }
}

/**
 * Evaluation proceeds in bounces: every sequencing step returns control to
 * the loop in `run` instead of calling deeper, so the depth of a chain of
 * `flatMap`s never reaches the call stack.
 */
type Bounce =
  | { readonly _tag: "Done" }
  | { readonly _tag: "More"; readonly next: () => Bounce }

type Continuation<S, A> = (value: A, state: MockState<S>) => Bounce

const done: Bounce = { _tag: "Done" }

const more = (next: () => Bounce): Bounce => ({ _tag: "More", next })

export class MockIO<S, A> {
  private constructor(
    private readonly step: (state: MockState<S>, k: Continuation<S, A>) => Bounce
  ) {}

  /** Run against a state, returning the result and the successor state. */
  run(state: MockState<S>): readonly [A, MockState<S>] {
    const outcome: { result: Option.Option<readonly [A, MockState<S>]> } = {
      result: Option.none()
    }
    let bounce: Bounce = this.step(state, (value, final) => {
      const pair: readonly [A, MockState<S>] = [value, final]
      outcome.result = Option.some(pair)
      return done
    })
    while (bounce._tag === "More") {
      bounce = bounce.next()
    }
    return Option.getOrThrowWith(
      outcome.result,
      () => new Error("MockIO program finished without a result")
    )
  }

  /**
   * Sequence: run this, tick the clock, then run the continuation.
   */
  flatMap<B>(f: (a: A) => MockIO<S, B>): MockIO<S, B> {
    return new MockIO<S, B>((state, k) =>
      more(() =>
        this.step(state, (a, successor) => more(() => f(a).step(tick(successor), k)))
      )
    )
  }

  /** Transform the result. Not a sequencing step: the clock is untouched. */
  map<B>(f: (a: A) => B): MockIO<S, B> {
    return new MockIO<S, B>((state, k) =>
      more(() => this.step(state, (a, successor) => more(() => k(f(a), successor))))
    )
  }

  andThen<B>(that: MockIO<S, B>): MockIO<S, B> {
    return this.flatMap(() => that)
  }

  *[Symbol.iterator](): Generator<MockStep<S>, A, unknown> {
    const slot = new StepSlot(this)
    yield slot
    return slot.value()
  }

  // ===========================================================================
  // Constructors
  // ===========================================================================

  static succeed<S, A>(value: A): MockIO<S, A> {
    return new MockIO<S, A>((state, k) => k(value, state))
  }

  /**
   * Record a fault and return the placeholder. The fault stays in
   * `capturedFault` until the state is replaced.
   */
  static fail<S, A>(fault: Fault, placeholder: A): MockIO<S, A> {
    return new MockIO<S, A>((state, k) =>
      k(placeholder, { ...state, capturedFault: Option.some(fault) })
    )
  }

  /** Apply a state transition and return a result, as one atomic step. */
  static transition<S, A>(
    f: (state: MockState<S>) => readonly [A, MockState<S>]
  ): MockIO<S, A> {
    return new MockIO<S, A>((state, k) => {
      const [value, successor] = f(state)
      return k(value, successor)
    })
  }

  /**
   * Sequence a generator body. Every `yield*` is one step; consecutive steps
   * are separated by one tick, exactly as a chain of `flatMap`s would be.
   *
   * @example
   * ```typescript
   * const program = MockIO.gen(function* () {
   *   const line = yield* M.console.getLine("stdin")
   *   yield* M.console.putStrLn("stdout", line)
   *   return line.length
   * })
   * ```
   */
  static gen<S, R>(body: () => Generator<MockStep<S>, R, unknown>): MockIO<S, R> {
    return new MockIO<S, R>((initial, k) => {
      const iterator = body()
      let state = initial
      let first = true
      let step = iterator.next()
      while (!step.done) {
        state = step.value.execute(first ? state : tick(state))
        first = false
        step = iterator.next()
      }
      return k(step.value, state)
    })
  }
}

/** Type lambda for `MockIO` with client-local state `S`. */
export interface MockIOTypeLambda<S> extends TypeLambda {
  readonly type: MockIO<S, this["Target"]>
}

/** Run a program, returning its result and final state. */
export const runMockIO = <S, A>(
  program: MockIO<S, A>,
  state: MockState<S>
): readonly [A, MockState<S>] => program.run(state)

/** Run a program and keep only its result. */
export const evaluateMockIO = <S, A>(program: MockIO<S, A>, state: MockState<S>): A =>
  program.run(state)[0]

/** Run a program and keep only its final state. */
export const executeMockIO = <S, A>(
  program: MockIO<S, A>,
  state: MockState<S>
): MockState<S> => program.run(state)[1]
