/**
 * Controller construction and the HTTP layer.
 */

import type { ControllerConfig } from '../config/index.js';
import { ApiController } from '../controller/api-controller.js';
import { ApiControllerBuilder } from './builder.js';

export { ApiControllerBuilder } from './builder.js';
export { type HttpTransport, FetchTransport, HttpClient, clientHeader } from './http.js';
export { type CallOptions, CallScope } from './call-scope.js';

/**
 * Create a controller with the given configuration.
 */
export function createController(config: ControllerConfig): ApiController {
  return new ApiController(config);
}

/**
 * Create a controller from environment variables.
 *
 * @param env - Defaults to `process.env`
 */
export function createControllerFromEnv(env: NodeJS.ProcessEnv = process.env): ApiController {
  return ApiControllerBuilder.fromEnv(env).build();
}
