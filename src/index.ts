/**
 * generative-language-client
 *
 * TypeScript client for the generateContent, streamGenerateContent and
 * countTokens endpoints of the generative language API.
 *
 * @example
 * ```typescript
 * import { createController, userContent, responseText } from 'generative-language-client';
 *
 * const controller = createController({ apiKey: 'your-api-key', model: 'gemini-1.5-flash' });
 *
 * const response = await controller.generateContent({
 *   contents: [userContent('Describe a tide pool in one sentence')],
 * });
 * console.log(responseText(response));
 *
 * for await (const chunk of controller.generateContentStream({ contents: [userContent('Count to five')] })) {
 *   process.stdout.write(responseText(chunk));
 * }
 * ```
 */

// Controller
export {
  ApiController,
  fullModelName,
  responseText,
  functionCalls,
  ensureCandidates,
  isBlocked,
  primaryRating,
  getSafetySummary,
  type SafetySummary,
} from './controller/index.js';

// Client construction and transport
export {
  createController,
  createControllerFromEnv,
  ApiControllerBuilder,
  type HttpTransport,
  FetchTransport,
  type CallOptions,
  clientHeader,
} from './client/index.js';

// Configuration
export {
  type AuthMethod,
  type ControllerConfig,
  type ResolvedControllerConfig,
  type RequestOptions,
  type ResolvedRequestOptions,
  type RequestDefaults,
  resolveConfig,
  resolveRequestOptions,
  validateConfig,
  createConfigFromEnv,
  DEFAULT_ENDPOINT,
  DEFAULT_API_VERSION,
  DEFAULT_TIMEOUT,
  DEFAULT_MODEL,
  MAX_TIMEOUT,
} from './config/index.js';

// Errors
export * from './error/index.js';

// Types
export * from './types/index.js';

// Serialization
export * from './serialization/index.js';

// Streaming
export { ChunkedJsonParser, decodeJsonArrayStream, type StreamDecodeOptions } from './streaming/index.js';

// Validation
export {
  validateGenerateContentRequest,
  validateCountTokensRequest,
  validateModelName,
  validateTimeout,
} from './validation/index.js';

// Observability
export {
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogConfig,
  ConsoleLogger,
  NoopLogger,
  createLogger,
  DEFAULT_LOG_CONFIG,
} from './observability/logging.js';

export { VERSION, LIBRARY_NAME } from './version.js';
