/**
 * Builder for creating controller instances.
 */

import {
  type AuthMethod,
  type ControllerConfig,
  createConfigFromEnv,
  type RequestDefaults,
} from '../config/index.js';
import { ApiController } from '../controller/api-controller.js';
import { InvalidConfigurationError } from '../error/index.js';
import type { Logger, LogLevel } from '../observability/logging.js';
import type { HttpTransport } from './http.js';

/**
 * Builder for creating controllers with a fluent API.
 */
export class ApiControllerBuilder {
  private apiKey?: string;
  private model?: string;
  private endpoint?: string;
  private apiVersion?: string;
  private timeout?: number;
  private transport?: HttpTransport;
  private logger?: Logger;
  private logLevel?: LogLevel;
  private authMethod?: AuthMethod;
  private customHeaders?: Record<string, string>;
  private defaults?: RequestDefaults;

  /**
   * Set the API key.
   */
  withApiKey(apiKey: string): this {
    this.apiKey = apiKey;
    return this;
  }

  withModel(model: string): this {
    this.model = model;
    return this;
  }

  /**
   * Set the base URL, without version.
   */
  withEndpoint(endpoint: string): this {
    this.endpoint = endpoint;
    return this;
  }

  withApiVersion(apiVersion: string): this {
    this.apiVersion = apiVersion;
    return this;
  }

  /**
   * Set the per-call deadline in milliseconds.
   */
  withTimeout(timeout: number): this {
    this.timeout = timeout;
    return this;
  }

  withTransport(transport: HttpTransport): this {
    this.transport = transport;
    return this;
  }

  withLogger(logger: Logger): this {
    this.logger = logger;
    return this;
  }

  /**
   * Level of the default console logger; ignored with withLogger().
   */
  withLogLevel(level: LogLevel): this {
    this.logLevel = level;
    return this;
  }

  withAuthMethod(authMethod: AuthMethod): this {
    this.authMethod = authMethod;
    return this;
  }

  withHeaders(headers: Record<string, string>): this {
    this.customHeaders = { ...this.customHeaders, ...headers };
    return this;
  }

  withDefaults(defaults: RequestDefaults): this {
    this.defaults = defaults;
    return this;
  }

  /**
   * Build the controller.
   */
  build(): ApiController {
    if (!this.apiKey) {
      throw new InvalidConfigurationError('API key is required. Use withApiKey() to set it.');
    }
    if (!this.model) {
      throw new InvalidConfigurationError('model name is required. Use withModel() to set it.');
    }

    return new ApiController({
      apiKey: this.apiKey,
      model: this.model,
      requestOptions: {
        endpoint: this.endpoint,
        apiVersion: this.apiVersion,
        timeout: this.timeout,
      },
      transport: this.transport,
      logger: this.logger,
      logLevel: this.logLevel,
      authMethod: this.authMethod,
      customHeaders: this.customHeaders,
      defaults: this.defaults,
    });
  }

  /**
   * A builder preloaded from environment variables.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): ApiControllerBuilder {
    const config: ControllerConfig = createConfigFromEnv(env);
    const builder = new ApiControllerBuilder().withApiKey(config.apiKey).withModel(config.model);
    const { endpoint, apiVersion, timeout } = config.requestOptions ?? {};

    if (endpoint) {
      builder.withEndpoint(endpoint);
    }
    if (apiVersion) {
      builder.withApiVersion(apiVersion);
    }
    if (timeout !== undefined) {
      builder.withTimeout(timeout);
    }
    if (config.logLevel) {
      builder.withLogLevel(config.logLevel);
    }
    return builder;
  }
}
