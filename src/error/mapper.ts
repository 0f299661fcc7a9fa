/**
 * Maps non-2xx responses to typed errors.
 */

import { z } from 'zod';
import {
  InvalidApiKeyError,
  QuotaExceededError,
  ServerError,
  ServiceDisabledError,
  UnsupportedUserLocationError,
  type ServerErrorInfo,
} from './categories.js';

const MAX_MESSAGE_LENGTH = 500;

const errorDetailSchema = z.object({
  '@type': z.string().optional(),
  reason: z.string().optional(),
  domain: z.string().optional(),
  metadata: z.record(z.string()).optional(),
});

const errorBodySchema = z.object({
  error: z.object({
    code: z.number().int().optional(),
    message: z.string().default(''),
    status: z.string().optional(),
    details: z.array(errorDetailSchema).optional(),
  }),
});

/** Parsed `{ "error": { ... } }` body */
export type ErrorBody = z.infer<typeof errorBodySchema>['error'];

/**
 * Parses an error body. Streaming endpoints wrap it in a one-element array.
 * Returns undefined if the body is not an error body.
 */
export function parseErrorBody(body: string): ErrorBody | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }

  const candidate = Array.isArray(parsed) ? parsed[0] : parsed;
  const result = errorBodySchema.safeParse(candidate);
  return result.success ? result.data.error : undefined;
}

/**
 * Maps an HTTP status and raw body to the matching ServerError subclass.
 */
export function mapErrorResponse(status: number, body: string): ServerError {
  const error = parseErrorBody(body);

  if (!error) {
    const text = body.trim() || 'empty response body';
    const message = `HTTP ${status}: ${text.substring(0, MAX_MESSAGE_LENGTH)}`;
    if (status === 401 || status === 403) {
      return new InvalidApiKeyError(message, status);
    }
    return new ServerError(message, status);
  }

  const reasons = (error.details ?? []).flatMap((detail) => (detail.reason ? [detail.reason] : []));
  const info: ServerErrorInfo = { apiStatus: error.status, reason: reasons[0] };
  const message = error.message || `HTTP ${status}`;

  if (reasons.includes('API_KEY_INVALID') || message.includes('API key not valid')) {
    return new InvalidApiKeyError(message, status, info);
  }
  if (reasons.includes('SERVICE_DISABLED')) {
    return new ServiceDisabledError(message, status, info);
  }
  if (message.includes('User location is not supported')) {
    return new UnsupportedUserLocationError(message, status, info);
  }
  if (error.status === 'RESOURCE_EXHAUSTED' || message.toLowerCase().includes('quota')) {
    return new QuotaExceededError(message, status, info);
  }
  if (status === 401 || error.status === 'UNAUTHENTICATED') {
    return new InvalidApiKeyError(message, status, info);
  }
  return new ServerError(message, status, info);
}

/**
 * Maps an error envelope found in a successful response, such as an element
 * of a stream that failed after it started. The envelope's own code wins over
 * the transport status. Returns undefined if the body is not an error body.
 */
export function mapErrorEnvelope(body: string, status: number): ServerError | undefined {
  const error = parseErrorBody(body);
  return error ? mapErrorResponse(error.code ?? status, body) : undefined;
}
