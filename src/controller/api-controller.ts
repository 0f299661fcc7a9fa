/**
 * Controller for the generate, stream and count endpoints of one model.
 */

import { type CallOptions, CallScope } from '../client/call-scope.js';
import { FetchTransport, HttpClient } from '../client/http.js';
import {
  type ControllerConfig,
  type ResolvedControllerConfig,
  resolveConfig,
  validateConfig,
} from '../config/index.js';
import { mapErrorEnvelope, SerializationError } from '../error/index.js';
import { createLogger, type Logger } from '../observability/logging.js';
import {
  decodeCountTokensResponse,
  decodeGenerateContentResponse,
  encodeCountTokensRequest,
  encodeGenerateContentRequest,
  serializeRequest,
} from '../serialization/index.js';
import { decodeJsonArrayStream } from '../streaming/index.js';
import {
  countTokensRequestFor,
  type CountTokensResponse,
  type GenerateContentRequest,
  type GenerateContentResponse,
} from '../types/index.js';
import {
  validateCountTokensRequest,
  validateGenerateContentRequest,
  validateModelName,
  validateTimeout,
} from '../validation/index.js';
import { ensureCandidates } from './response.js';

type GenerateMethod = 'generateContent' | 'streamGenerateContent' | 'countTokens';

/**
 * Resource path of a model. A name containing "/" is used verbatim,
 * anything else is taken to live under "models/".
 *
 * @example
 * fullModelName('gemini-pro');      // 'models/gemini-pro'
 * fullModelName('tunedModels/abc'); // 'tunedModels/abc'
 */
export function fullModelName(name: string): string {
  return name.includes('/') ? name : `models/${name}`;
}

/**
 * Decodes a generate response body. An error envelope in the body is raised
 * as the matching ServerError.
 */
function decodeGenerateBody(text: string, status: number): GenerateContentResponse {
  const error = mapErrorEnvelope(text, status);
  if (error) {
    throw error;
  }
  return ensureCandidates(decodeGenerateContentResponse(text));
}

/**
 * Calls the generative language API for a single model.
 *
 * The controller keeps no state between calls; concurrent calls share only
 * the transport.
 *
 * @example
 * ```typescript
 * const controller = new ApiController({ apiKey: 'key', model: 'gemini-1.5-flash' });
 * const response = await controller.generateContent({
 *   contents: [userContent('Write a haiku about tide pools')],
 * });
 * console.log(responseText(response));
 * ```
 */
export class ApiController {
  readonly config: ResolvedControllerConfig;
  readonly modelPath: string;
  private readonly http: HttpClient;
  private readonly logger: Logger;

  constructor(config: ControllerConfig) {
    validateConfig(config);
    validateModelName(config.model);

    this.config = resolveConfig(config);
    this.modelPath = fullModelName(this.config.model);
    this.logger = (config.logger ?? createLogger({ level: this.config.logLevel })).child({
      model: this.modelPath,
    });
    this.http = new HttpClient(this.config, config.transport ?? new FetchTransport(), this.logger);
  }

  /**
   * Generates a complete response.
   */
  async generateContent(
    request: GenerateContentRequest,
    options: CallOptions = {}
  ): Promise<GenerateContentResponse> {
    const body = this.encodeGenerate(request);
    const scope = this.openScope(options);

    try {
      const response = await this.http.post(this.path('generateContent'), body, scope);
      const text = await this.http.readText(response, scope);
      const decoded = decodeGenerateBody(text, response.status);
      this.logger.debug('Response received', { candidates: decoded.candidates?.length ?? 0 });
      return decoded;
    } finally {
      scope.dispose();
    }
  }

  /**
   * Streams the response as it is generated.
   *
   * Nothing is sent until iteration starts. The call's deadline covers the
   * whole stream; leaving the loop early cancels the request.
   */
  async *generateContentStream(
    request: GenerateContentRequest,
    options: CallOptions = {}
  ): AsyncGenerator<GenerateContentResponse, void, undefined> {
    const body = this.encodeGenerate(request);
    const scope = this.openScope(options);
    let completed = false;

    try {
      const response = await this.http.post(this.path('streamGenerateContent'), body, scope);
      if (!response.body) {
        throw new SerializationError('Streaming response has no body');
      }

      const { status } = response;
      const elements = decodeJsonArrayStream(response.body, (text) => decodeGenerateBody(text, status), {
        signal: scope.signal,
      });
      let count = 0;
      try {
        for await (const element of elements) {
          count++;
          yield element;
        }
      } catch (error) {
        throw scope.toError(error);
      }

      completed = true;
      this.logger.debug('Stream completed', { elements: count });
    } finally {
      if (!completed) {
        scope.abort();
      }
      scope.dispose();
    }
  }

  /**
   * Counts the tokens `generateContent` would send for a request, with the
   * controller's defaults applied. The body takes the legacy shape on `v1`
   * and the embedded shape on every other API version.
   */
  async countTokens(request: GenerateContentRequest, options: CallOptions = {}): Promise<CountTokensResponse> {
    const countRequest = countTokensRequestFor(this.applyDefaults(request), this.config.requestOptions.apiVersion);
    validateCountTokensRequest(countRequest);
    const body = serializeRequest(encodeCountTokensRequest(countRequest));
    const scope = this.openScope(options);

    try {
      const response = await this.http.post(this.path('countTokens'), body, scope);
      const text = await this.http.readText(response, scope);
      return decodeCountTokensResponse(text);
    } finally {
      scope.dispose();
    }
  }

  private path(method: GenerateMethod): string {
    return `${this.modelPath}:${method}`;
  }

  private openScope(options: CallOptions): CallScope {
    validateTimeout(options.timeout);
    return new CallScope(options.timeout ?? this.config.requestOptions.timeout, options.signal);
  }

  /** Fills the fields a request leaves unset from the controller's defaults. */
  private applyDefaults(request: GenerateContentRequest): GenerateContentRequest {
    const { defaults } = this.config;
    return {
      contents: request.contents,
      safetySettings: request.safetySettings ?? defaults.safetySettings,
      generationConfig: request.generationConfig ?? defaults.generationConfig,
      tools: request.tools ?? defaults.tools,
      toolConfig: request.toolConfig ?? defaults.toolConfig,
      systemInstruction: request.systemInstruction ?? defaults.systemInstruction,
    };
  }

  /**
   * Applies the controller's defaults, validates and encodes. The request's
   * own `model` never reaches the body.
   */
  private encodeGenerate(request: GenerateContentRequest): string {
    const merged = this.applyDefaults(request);
    validateGenerateContentRequest(merged);
    return serializeRequest(encodeGenerateContentRequest(merged));
  }
}
