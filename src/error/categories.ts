/**
 * Error category classes for granular error handling.
 */

import { GenerativeAIError } from './types.js';

// ============================================================================
// Serialization Errors
// ============================================================================

/** Malformed JSON, a wire shape that does not match the schema, or a truncated stream */
export class SerializationError extends GenerativeAIError {
  constructor(message: string, options: { cause?: unknown; details?: Record<string, unknown> } = {}) {
    super({
      type: 'serialization_error',
      message,
      isRetryable: false,
      cause: options.cause,
      details: options.details,
    });
    this.name = 'SerializationError';
  }
}

// ============================================================================
// Client Errors
// ============================================================================

/** The service could not be reached, or the client was misused */
export class ClientError extends GenerativeAIError {
  constructor(
    message: string,
    options: { type?: string; cause?: unknown; isRetryable?: boolean; details?: Record<string, unknown> } = {}
  ) {
    super({
      type: options.type ?? 'client_error',
      message,
      isRetryable: options.isRetryable ?? true,
      cause: options.cause,
      details: options.details,
    });
    this.name = 'ClientError';
  }
}

/** Validation detail */
export interface ValidationDetail {
  field: string;
  description: string;
  value?: unknown;
}

/** Request rejected before it was sent */
export class ValidationError extends ClientError {
  public readonly validationDetails: ValidationDetail[];

  constructor(message: string, details: ValidationDetail[] = []) {
    super(`Validation error: ${message}`, {
      type: 'validation_error',
      isRetryable: false,
      details: { validationDetails: details },
    });
    this.name = 'ValidationError';
    this.validationDetails = details;
  }
}

/** Invalid controller configuration */
export class InvalidConfigurationError extends ClientError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`, {
      type: 'configuration_error',
      isRetryable: false,
    });
    this.name = 'InvalidConfigurationError';
  }
}

/** The caller aborted the call */
export class RequestCancelledError extends ClientError {
  constructor(reason?: unknown) {
    super('Request was cancelled', {
      type: 'cancelled',
      isRetryable: false,
      cause: reason,
    });
    this.name = 'RequestCancelledError';
  }
}

// ============================================================================
// Timeout
// ============================================================================

/** The call did not complete before its deadline */
export class RequestTimeoutError extends GenerativeAIError {
  public readonly timeout: number;

  constructor(timeout: number) {
    super({
      type: 'timeout_error',
      message: `Request timed out after ${timeout}ms`,
      isRetryable: true,
    });
    this.name = 'RequestTimeoutError';
    this.timeout = timeout;
  }
}

// ============================================================================
// Server Errors
// ============================================================================

/** Fields parsed from a server error body */
export interface ServerErrorInfo {
  /** Canonical status string, e.g. "INVALID_ARGUMENT" */
  apiStatus?: string;
  /** First ErrorInfo reason, e.g. "API_KEY_INVALID" */
  reason?: string;
}

/** Non-2xx response from the service */
export class ServerError extends GenerativeAIError {
  public readonly apiStatus?: string;
  public readonly reason?: string;

  constructor(
    message: string,
    status: number,
    info: ServerErrorInfo = {},
    options: { type?: string; isRetryable?: boolean } = {}
  ) {
    super({
      type: options.type ?? 'server_error',
      message,
      status,
      isRetryable: options.isRetryable ?? (status >= 500 || status === 429),
      details: info.apiStatus || info.reason ? { ...info } : undefined,
    });
    this.name = 'ServerError';
    this.apiStatus = info.apiStatus;
    this.reason = info.reason;
  }
}

/** The API key was rejected */
export class InvalidApiKeyError extends ServerError {
  constructor(message: string, status: number, info: ServerErrorInfo = {}) {
    super(message, status, info, { type: 'authentication_error', isRetryable: false });
    this.name = 'InvalidApiKeyError';
  }
}

/** The project ran out of quota */
export class QuotaExceededError extends ServerError {
  constructor(message: string, status: number, info: ServerErrorInfo = {}) {
    super(message, status, info, { type: 'quota_exceeded', isRetryable: true });
    this.name = 'QuotaExceededError';
  }
}

/** The API is not enabled for the project */
export class ServiceDisabledError extends ServerError {
  constructor(message: string, status: number, info: ServerErrorInfo = {}) {
    super(message, status, info, { type: 'service_disabled', isRetryable: false });
    this.name = 'ServiceDisabledError';
  }
}

/** The service is not offered in the caller's region */
export class UnsupportedUserLocationError extends ServerError {
  constructor(message: string, status: number, info: ServerErrorInfo = {}) {
    super(message, status, info, { type: 'unsupported_location', isRetryable: false });
    this.name = 'UnsupportedUserLocationError';
  }
}
