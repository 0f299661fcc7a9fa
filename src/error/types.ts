/**
 * Base error class for all errors raised by the client.
 */
export class GenerativeAIError extends Error {
  /** The type/category of error */
  public readonly type: string;

  /** HTTP status code if applicable */
  public readonly status?: number;

  /** Whether the same call may succeed if repeated */
  public readonly isRetryable: boolean;

  /** Additional error details */
  public readonly details?: Record<string, unknown>;

  constructor(options: {
    type: string;
    message: string;
    status?: number;
    isRetryable?: boolean;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'GenerativeAIError';
    this.type = options.type;
    this.status = options.status;
    this.isRetryable = options.isRetryable ?? false;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Returns JSON representation of the error */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      isRetryable: this.isRetryable,
      details: this.details,
    };
  }
}
