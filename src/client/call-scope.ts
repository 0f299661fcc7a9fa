/**
 * Deadline and cancellation for a single call.
 */

import {
  ClientError,
  GenerativeAIError,
  RequestCancelledError,
  RequestTimeoutError,
} from '../error/index.js';

/** Per-call options */
export interface CallOptions {
  /** Aborting this signal cancels the call */
  signal?: AbortSignal;
  /** Overrides the controller's timeout for this call (ms) */
  timeout?: number;
}

/**
 * Owns the AbortController of one call. The deadline starts when the scope
 * is created; a caller abort and an expired deadline both abort the same
 * signal, which the transport receives.
 */
export class CallScope {
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout>;
  private readonly onCallerAbort?: () => void;

  constructor(
    readonly timeout: number,
    private readonly callerSignal?: AbortSignal
  ) {
    this.timer = setTimeout(() => {
      this.controller.abort(new RequestTimeoutError(timeout));
    }, timeout);

    if (callerSignal?.aborted) {
      this.controller.abort(new RequestCancelledError(callerSignal.reason));
    } else if (callerSignal) {
      this.onCallerAbort = () => this.controller.abort(new RequestCancelledError(callerSignal.reason));
      callerSignal.addEventListener('abort', this.onCallerAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Settles like `promise`, or rejects with the abort error as soon as the
   * scope is aborted, whichever happens first.
   */
  race<T>(promise: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(this.abortError());
      if (this.signal.aborted) {
        onAbort();
      } else {
        this.signal.addEventListener('abort', onAbort, { once: true });
      }

      promise.then(
        (value) => {
          this.signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          this.signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  /**
   * The error raised to the caller for a failure inside this scope.
   */
  toError(error: unknown): GenerativeAIError {
    if (this.signal.aborted) {
      return this.abortError();
    }
    if (error instanceof GenerativeAIError) {
      return error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new ClientError(`Could not reach the service: ${reason}`, { cause: error });
  }

  /** Aborts in-flight transport work, e.g. when a stream is abandoned. */
  abort(): void {
    if (!this.signal.aborted) {
      this.controller.abort(new RequestCancelledError());
    }
  }

  /** Stops the deadline timer and detaches from the caller's signal. */
  dispose(): void {
    clearTimeout(this.timer);
    if (this.callerSignal && this.onCallerAbort) {
      this.callerSignal.removeEventListener('abort', this.onCallerAbort);
    }
  }

  private abortError(): GenerativeAIError {
    const reason: unknown = this.signal.reason;
    return reason instanceof GenerativeAIError ? reason : new RequestCancelledError(reason);
  }
}
