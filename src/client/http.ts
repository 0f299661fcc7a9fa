/**
 * HTTP layer: the transport seam and the client that shapes requests.
 */

import type { ResolvedControllerConfig } from '../config/index.js';
import { mapErrorResponse } from '../error/index.js';
import type { Logger } from '../observability/logging.js';
import { LIBRARY_NAME, VERSION } from '../version.js';
import type { CallScope } from './call-scope.js';

/**
 * Sends one HTTP request. Implementations must honour `init.signal` and be
 * safe to call concurrently; connection reuse is their concern.
 */
export interface HttpTransport {
  request(url: string, init: RequestInit): Promise<Response>;
}

/**
 * Transport backed by the global fetch of Node.js.
 */
export class FetchTransport implements HttpTransport {
  request(url: string, init: RequestInit): Promise<Response> {
    return fetch(url, init);
  }
}

/** Value of the client identification header */
export function clientHeader(): string {
  return `${LIBRARY_NAME}/${VERSION} gl-node/${process.versions.node}`;
}

/**
 * HTTP client for the generative language API.
 */
export class HttpClient {
  constructor(
    private readonly config: ResolvedControllerConfig,
    private readonly transport: HttpTransport,
    private readonly logger: Logger
  ) {}

  /**
   * Build the full URL for a path below `{endpoint}/{apiVersion}/`.
   */
  buildUrl(path: string, queryParams: Record<string, string> = {}): string {
    const { endpoint, apiVersion } = this.config.requestOptions;
    const params = new URLSearchParams(queryParams);
    if (this.config.authMethod === 'queryParam') {
      params.set('key', this.config.apiKey);
    }
    const query = params.toString();
    return `${endpoint}/${apiVersion}/${path}${query ? `?${query}` : ''}`;
  }

  /**
   * Get headers for a JSON request.
   */
  getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      ...this.config.customHeaders,
      'Content-Type': 'application/json',
      'x-goog-api-client': clientHeader(),
    };
    if (this.config.authMethod === 'header') {
      headers['x-goog-api-key'] = this.config.apiKey;
    }
    return headers;
  }

  /**
   * POSTs a JSON body. Resolves with a 2xx response; anything else is
   * raised as a typed error.
   */
  async post(path: string, body: string, scope: CallScope): Promise<Response> {
    const url = this.buildUrl(path);
    this.logger.debug('Sending request', { path, bytes: body.length });

    let response: Response;
    try {
      response = await scope.race(
        this.transport.request(url, {
          method: 'POST',
          headers: this.getHeaders(),
          body,
          signal: scope.signal,
        })
      );
    } catch (error) {
      throw scope.toError(error);
    }

    if (!response.ok) {
      const errorBody = await this.readText(response, scope);
      const error = mapErrorResponse(response.status, errorBody);
      this.logger.warn('Request failed', { path, status: response.status, error: error.name });
      throw error;
    }

    return response;
  }

  /**
   * Reads a whole body within the call's deadline.
   */
  async readText(response: Response, scope: CallScope): Promise<string> {
    try {
      return await scope.race(response.text());
    } catch (error) {
      throw scope.toError(error);
    }
  }
}
