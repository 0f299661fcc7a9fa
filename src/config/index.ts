/**
 * Configuration types for the generative language API controller.
 */

import { z } from 'zod';
import { InvalidConfigurationError } from '../error/index.js';
import type { HttpTransport } from '../client/http.js';
import type { Logger, LogLevel } from '../observability/logging.js';
import type { Content } from '../types/content.js';
import type { GenerationConfig } from '../types/generation.js';
import type { SafetySetting } from '../types/safety.js';
import type { Tool, ToolConfig } from '../types/tools.js';

/** Default API endpoint */
export const DEFAULT_ENDPOINT = 'https://generativelanguage.googleapis.com';

/** Default API version */
export const DEFAULT_API_VERSION = 'v1beta';

/** Default request timeout (120 seconds) */
export const DEFAULT_TIMEOUT = 120_000;

/** Largest timeout a timer accepts (2^31 - 1 ms) */
export const MAX_TIMEOUT = 2_147_483_647;

/** Default model used by createConfigFromEnv */
export const DEFAULT_MODEL = 'gemini-1.5-flash';

/** Authentication method */
export type AuthMethod = 'header' | 'queryParam';

/** Per-controller request options */
export interface RequestOptions {
  /** Deadline for a whole call in milliseconds */
  readonly timeout?: number;
  /** API surface, used as the first path segment (e.g. "v1beta") */
  readonly apiVersion?: string;
  /** Base URL, without version */
  readonly endpoint?: string;
}

/** Resolved request options with every default applied */
export interface ResolvedRequestOptions {
  readonly timeout: number;
  readonly apiVersion: string;
  readonly endpoint: string;
}

/** Values applied to requests that leave them unset */
export interface RequestDefaults {
  readonly generationConfig?: GenerationConfig;
  readonly safetySettings?: readonly SafetySetting[];
  readonly tools?: readonly Tool[];
  readonly toolConfig?: ToolConfig;
  readonly systemInstruction?: Content;
}

/** Configuration for the API controller */
export interface ControllerConfig {
  /** API key (required) */
  apiKey: string;
  /** Model name, e.g. "gemini-1.5-flash" or "tunedModels/my-model" */
  model: string;
  /** Timeout, API version and endpoint */
  requestOptions?: RequestOptions;
  /** HTTP transport; defaults to the global fetch */
  transport?: HttpTransport;
  /** Logger; defaults to a console logger at `logLevel` */
  logger?: Logger;
  /** Log level for the default logger */
  logLevel?: LogLevel;
  /** Authentication method */
  authMethod?: AuthMethod;
  /** Extra headers sent with every request */
  customHeaders?: Record<string, string>;
  /** Request-level defaults */
  defaults?: RequestDefaults;
}

/** Resolved configuration with all defaults applied */
export interface ResolvedControllerConfig {
  readonly apiKey: string;
  readonly model: string;
  readonly requestOptions: ResolvedRequestOptions;
  readonly authMethod: AuthMethod;
  readonly customHeaders: Readonly<Record<string, string>>;
  readonly logLevel: LogLevel;
  readonly defaults: RequestDefaults;
}

const configSchema = z.object({
  apiKey: z.string().min(1, 'API key is required'),
  model: z.string().min(1, 'model name is required'),
  requestOptions: z
    .object({
      timeout: z.number().int().positive().max(MAX_TIMEOUT).optional(),
      apiVersion: z.string().min(1).regex(/^[^/]+$/, 'must not contain "/"').optional(),
      endpoint: z.string().url().optional(),
    })
    .optional(),
  authMethod: z.enum(['header', 'queryParam']).optional(),
  customHeaders: z.record(z.string()).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

/**
 * Resolve request options with defaults.
 */
export function resolveRequestOptions(options: RequestOptions = {}): ResolvedRequestOptions {
  return {
    timeout: options.timeout ?? DEFAULT_TIMEOUT,
    apiVersion: options.apiVersion ?? DEFAULT_API_VERSION,
    endpoint: (options.endpoint ?? DEFAULT_ENDPOINT).replace(/\/+$/, ''),
  };
}

/**
 * Resolve configuration with defaults.
 */
export function resolveConfig(config: ControllerConfig): ResolvedControllerConfig {
  return {
    apiKey: config.apiKey,
    model: config.model,
    requestOptions: resolveRequestOptions(config.requestOptions),
    authMethod: config.authMethod ?? 'header',
    customHeaders: { ...config.customHeaders },
    logLevel: config.logLevel ?? 'info',
    defaults: { ...config.defaults },
  };
}

/**
 * Validate configuration.
 */
export function validateConfig(config: ControllerConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new InvalidConfigurationError(issues.join(', '));
  }
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const timeout = Number(value);
  if (!Number.isInteger(timeout)) {
    throw new InvalidConfigurationError(`GEMINI_TIMEOUT is not a number: ${value}`);
  }
  return timeout;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value) {
    case undefined:
    case '':
      return undefined;
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      throw new InvalidConfigurationError(`GEMINI_LOG_LEVEL is not a log level: ${value}`);
  }
}

/**
 * Create configuration from environment variables.
 */
export function createConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ControllerConfig {
  const apiKey = env.GEMINI_API_KEY ?? env.GOOGLE_API_KEY;

  if (!apiKey) {
    throw new InvalidConfigurationError(
      'missing API key. Set GEMINI_API_KEY or GOOGLE_API_KEY environment variable.'
    );
  }

  return {
    apiKey,
    model: env.GEMINI_MODEL || DEFAULT_MODEL,
    requestOptions: {
      endpoint: env.GEMINI_ENDPOINT || undefined,
      apiVersion: env.GEMINI_API_VERSION || undefined,
      timeout: parseTimeout(env.GEMINI_TIMEOUT),
    },
    logLevel: parseLogLevel(env.GEMINI_LOG_LEVEL),
  };
}
