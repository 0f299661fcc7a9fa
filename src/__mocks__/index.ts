/**
 * Mock implementations for testing the controller in isolation.
 */

export {
  MockHttpClient,
  type MockResponse,
  type RecordedRequest,
  type StreamHandle,
} from './http-client.js';
