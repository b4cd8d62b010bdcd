/**
 * Mock servers and response builders.
 *
 * @module @simfx/test-utils/mocks
 */

export {
  createMockServer,
  route,
  callLog,
  withCallLog,
  counterServer,
  resourceServer,
  type HttpMethod,
  type MockRequest,
  type RouteHandler,
  type MockRoute,
  type MockServerConfig,
  type CallLog,
  type ResourceStore
} from "./mock-server.js"

export {
  encodeText,
  decodeText,
  response,
  textResponse,
  notFound,
  noContent,
  transportFailure,
  statusOf,
  bodyText
} from "./responses.js"
