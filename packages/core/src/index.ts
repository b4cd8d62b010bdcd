/**
 * @simfx/core - Capability interpreters and the assertion framework.
 *
 * Programs are written once against `Interpreter<F>` and run either under the
 * deterministic mock interpreter or the live Effect interpreter. Test trees
 * collect assertions, which summarize into pass/fail counts.
 */

// =============================================================================
// Errors
// =============================================================================
export {
  EndOfInputFault,
  NotFoundFault,
  StorageFullFault,
  TransportFault,
  IoFault,
  InvalidSeedError,
  InvalidRangeError,
  SuiteFailedError
} from "./errors.js"
export type { Fault } from "./errors.js"

// =============================================================================
// Capabilities
// =============================================================================
export { forEach, readLine, printLine } from "./capabilities.js"
export type {
  Program,
  HttpResult,
  ConsoleCapability,
  TimerCapability,
  TryCapability,
  FilesCapability,
  RandomCapability,
  HttpCapability,
  Interpreter
} from "./capabilities.js"

// =============================================================================
// Mock interpreter
// =============================================================================
export { DEFAULT_SEED, mockGen, next, split, nextBetween, take } from "./mock/mock-gen.js"
export type { MockGen } from "./mock/mock-gen.js"
export {
  DEFAULT_EPOCH,
  DEFAULT_EPOCH_ISO,
  makeMockState,
  tick,
  consoleTranscript,
  fileTranscript
} from "./mock/mock-state.js"
export type { MockServer, MockState, MockStateOverrides } from "./mock/mock-state.js"
export { MockIO, runMockIO, evaluateMockIO, executeMockIO } from "./mock/mock-io.js"
export type { MockIOTypeLambda, MockStep } from "./mock/mock-io.js"
export { MOCK_CHAR_INPUT, makeMockInterpreter } from "./mock/mock-interpreter.js"
export type { MockInterpreter, MockStateAccess } from "./mock/mock-interpreter.js"

// =============================================================================
// Live interpreter
// =============================================================================
export {
  LiveInterpreter,
  LiveInterpreterLive,
  makeLiveInterpreter,
  platformErrorToFault
} from "./live/live-interpreter.js"
export type { LiveDependencies, LiveInterpreterShape } from "./live/live-interpreter.js"
export { NodeLiveInterpreter } from "./live/node.js"

// =============================================================================
// Assertions
// =============================================================================
export { structurallyEqual, isInfixOf, show } from "./assert/equality.js"
export type { Sequence } from "./assert/equality.js"
export {
  success,
  failure,
  assertSuccessIf,
  assertSuccess,
  assertFailure,
  assertTrue,
  assertFalse,
  assertEqual,
  assertNotEqual,
  assertIsSubstring,
  assertIsNotSubstring,
  assertIsNamedSubstring,
  assertIsNotNamedSubstring,
  showAssertion
} from "./assert/assertion.js"
export {
  empty,
  combine,
  summary,
  summarize,
  summarizeAll,
  total,
  renderSummary,
  printSummary,
  assertSuitePassed
} from "./assert/summary.js"
export { AssertContext } from "./assert/context.js"

// =============================================================================
// Test trees and suites
// =============================================================================
export {
  testCase,
  testGroup,
  testLabel,
  runTestTree,
  countCases
} from "./test-tree.js"
export type {
  TestTree,
  TestCase,
  TestCaseNode,
  TestGroupNode,
  TestLabelNode
} from "./test-tree.js"
export { runMockSuite, runLiveSuite } from "./suite.js"
export type { SuiteResult, MockSuiteResult } from "./suite.js"

// =============================================================================
// Configuration
// =============================================================================
export { MockConfig, mockStateFromConfig } from "./config.js"
