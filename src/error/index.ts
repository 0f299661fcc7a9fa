/**
 * Error exports for the generative language client.
 */

// Base error
export { GenerativeAIError } from './types.js';

// Error categories
export {
  SerializationError,
  ClientError,
  type ValidationDetail,
  ValidationError,
  InvalidConfigurationError,
  RequestCancelledError,
  RequestTimeoutError,
  type ServerErrorInfo,
  ServerError,
  InvalidApiKeyError,
  QuotaExceededError,
  ServiceDisabledError,
  UnsupportedUserLocationError,
} from './categories.js';

// Error mapping utilities
export { mapErrorEnvelope, mapErrorResponse, parseErrorBody, type ErrorBody } from './mapper.js';
