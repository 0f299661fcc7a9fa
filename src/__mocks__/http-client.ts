/**
 * Mock HTTP transport for testing.
 *
 * Tests enqueue replies and inspect the recorded requests afterwards
 * (Arrange-Act-Assert). Streaming replies can be fed by the test while the
 * code under test is reading them.
 */

import type { HttpTransport } from '../client/http.js';

export interface MockResponse {
  status: number;
  body: string;
  headers?: Record<string, string>;
}

/** A request as the transport received it */
export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body?: string;
  signal?: AbortSignal;
}

/**
 * Test-side handle on a streaming body.
 */
export interface StreamHandle {
  /** Enqueues text as the next chunk */
  push(text: string): void;
  /** Ends the body */
  close(): void;
  /** Whether the reader cancelled the body */
  readonly cancelled: boolean;
}

type Reply = (request: RecordedRequest) => Promise<Response>;

const encoder = new TextEncoder();

function abortReason(signal: AbortSignal | undefined): unknown {
  return signal?.reason ?? new DOMException('The operation was aborted.', 'AbortError');
}

/**
 * Mock transport implementation for testing.
 *
 * @example
 * ```typescript
 * // Arrange
 * const transport = new MockHttpClient();
 * transport.enqueueJsonResponse(200, { totalTokens: 5 });
 * const controller = new ApiController({ apiKey: 'test-key', model: 'gemini-pro', transport });
 *
 * // Act
 * const result = await controller.countTokens({ contents: [userContent('hi')] });
 *
 * // Assert
 * expect(result.totalTokens).toBe(5);
 * transport.verifyRequestCount(1);
 * ```
 */
export class MockHttpClient implements HttpTransport {
  private replies: Reply[] = [];
  private requests: RecordedRequest[] = [];

  /**
   * Enqueue a raw response to be returned by the next request.
   */
  enqueueResponse(response: MockResponse): void {
    this.replies.push(async () => new Response(response.body, { status: response.status, headers: response.headers }));
  }

  /**
   * Enqueue a JSON response with the given status code and body.
   */
  enqueueJsonResponse(status: number, body: unknown): void {
    this.enqueueResponse({
      status,
      body: JSON.stringify(body),
      headers: { 'content-type': 'application/json' },
    });
  }

  /**
   * Enqueue an error response in the API's error envelope.
   *
   * @example
   * ```typescript
   * transport.enqueueErrorResponse(404, 'models/x is not found', { status: 'NOT_FOUND' });
   * ```
   */
  enqueueErrorResponse(status: number, message: string, extra: { status?: string; reason?: string } = {}): void {
    this.enqueueJsonResponse(status, {
      error: {
        code: status,
        message,
        status: extra.status,
        details: extra.reason ? [{ '@type': 'type.googleapis.com/google.rpc.ErrorInfo', reason: extra.reason }] : undefined,
      },
    });
  }

  /**
   * Enqueue a streaming response whose body is the given chunks. With
   * `close: false` the body stays open after the last chunk until the
   * request is aborted or the reader cancels.
   */
  enqueueStreamingResponse(chunks: readonly string[], options: { close?: boolean } = {}): void {
    const close = options.close ?? true;
    this.replies.push(async (request) => {
      const { stream, handle } = this.createStream(request.signal);
      for (const chunk of chunks) {
        handle.push(chunk);
      }
      if (close) {
        handle.close();
      }
      return new Response(stream, { status: 200, headers: { 'content-type': 'application/json' } });
    });
  }

  /**
   * Enqueue a streaming response fed by the test through the returned
   * handle.
   */
  enqueueControlledStream(): StreamHandle {
    let cancelled = false;
    const pending: Array<{ kind: 'push'; text: string } | { kind: 'close' }> = [];
    let live: StreamHandle | undefined;

    this.replies.push(async (request) => {
      const { stream, handle } = this.createStream(request.signal, () => {
        cancelled = true;
      });
      live = handle;
      for (const op of pending.splice(0)) {
        if (op.kind === 'push') {
          handle.push(op.text);
        } else {
          handle.close();
        }
      }
      return new Response(stream, { status: 200, headers: { 'content-type': 'application/json' } });
    });

    return {
      push: (text) => (live ? live.push(text) : pending.push({ kind: 'push', text })),
      close: () => (live ? live.close() : pending.push({ kind: 'close' })),
      get cancelled() {
        return cancelled;
      },
    };
  }

  /**
   * Enqueue a request that never answers. By default it rejects when its
   * signal aborts, like fetch; with `honourSignal: false` it ignores the
   * signal entirely.
   */
  enqueueHangingResponse(options: { honourSignal?: boolean } = {}): void {
    const honourSignal = options.honourSignal ?? true;
    this.replies.push(
      (request) =>
        new Promise<Response>((_resolve, reject) => {
          if (honourSignal) {
            request.signal?.addEventListener('abort', () => reject(abortReason(request.signal)), { once: true });
          }
        })
    );
  }

  /**
   * Enqueue a transport failure, e.g. a refused connection.
   */
  enqueueNetworkError(error: Error = new TypeError('fetch failed')): void {
    this.replies.push(() => Promise.reject(error));
  }

  /**
   * Get all requests that were made.
   */
  getRequests(): RecordedRequest[] {
    return [...this.requests];
  }

  /**
   * Get the last request that was made.
   */
  getLastRequest(): RecordedRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  /**
   * Parsed JSON body of the request at `index`.
   */
  getJsonBody(index = this.requests.length - 1): unknown {
    const body = this.requests[index]?.body;
    if (body === undefined) {
      throw new Error(`No request body at index ${index}`);
    }
    return JSON.parse(body);
  }

  /**
   * Verify that exactly the expected number of requests were made.
   *
   * @throws {Error} If the actual count doesn't match expected
   */
  verifyRequestCount(expected: number): void {
    if (this.requests.length !== expected) {
      throw new Error(`Expected ${expected} requests, got ${this.requests.length}`);
    }
  }

  /**
   * Verify that a request was made with the expected method and URL pattern.
   *
   * @throws {Error} If the request doesn't match expectations
   */
  verifyRequest(index: number, method: string, urlContains: string): void {
    const request = this.requests[index];
    if (!request) {
      throw new Error(`No request at index ${index}`);
    }
    if (request.method !== method) {
      throw new Error(`Expected method ${method}, got ${request.method}`);
    }
    if (!request.url.includes(urlContains)) {
      throw new Error(`Expected URL to contain '${urlContains}', got '${request.url}'`);
    }
  }

  /**
   * Verify that a request carries a header with the given value.
   *
   * @throws {Error} If the header doesn't match expectations
   */
  verifyHeader(index: number, headerName: string, headerValue: string): void {
    const request = this.requests[index];
    if (!request) {
      throw new Error(`No request at index ${index}`);
    }
    const actualValue = request.headers.get(headerName);
    if (actualValue !== headerValue) {
      throw new Error(`Expected header '${headerName}' to be '${headerValue}', got '${actualValue}'`);
    }
  }

  /**
   * Clear all recorded requests.
   */
  clearRequests(): void {
    this.requests = [];
  }

  async request(url: string, init: RequestInit): Promise<Response> {
    const recorded: RecordedRequest = {
      url,
      method: init.method ?? 'GET',
      headers: new Headers(init.headers),
      body: typeof init.body === 'string' ? init.body : undefined,
      signal: init.signal ?? undefined,
    };
    this.requests.push(recorded);

    const reply = this.replies.shift();
    if (!reply) {
      throw new Error('No response configured in MockHttpClient');
    }
    return reply(recorded);
  }

  private createStream(
    signal: AbortSignal | undefined,
    onCancel: () => void = () => undefined
  ): { stream: ReadableStream<Uint8Array>; handle: StreamHandle } {
    let controller: ReadableStreamDefaultController<Uint8Array> | undefined;
    let open = true;
    let cancelled = false;

    const stream = new ReadableStream<Uint8Array>({
      start(c) {
        controller = c;
      },
      cancel() {
        open = false;
        cancelled = true;
        onCancel();
      },
    });

    signal?.addEventListener(
      'abort',
      () => {
        if (open) {
          open = false;
          controller?.error(abortReason(signal));
        }
      },
      { once: true }
    );

    const handle: StreamHandle = {
      push(text) {
        if (open) {
          controller?.enqueue(encoder.encode(text));
        }
      },
      close() {
        if (open) {
          open = false;
          controller?.close();
        }
      },
      get cancelled() {
        return cancelled;
      },
    };
    return { stream, handle };
  }
}
