/**
 * Configuration and builder tests
 */

import { describe, it, expect } from 'vitest';
import { MockHttpClient } from '../src/__mocks__/index.js';
import { ApiControllerBuilder, createControllerFromEnv } from '../src/client/index.js';
import {
  createConfigFromEnv,
  DEFAULT_API_VERSION,
  DEFAULT_ENDPOINT,
  DEFAULT_TIMEOUT,
  MAX_TIMEOUT,
  resolveConfig,
  validateConfig,
} from '../src/config/index.js';
import { InvalidConfigurationError } from '../src/error/index.js';
import { NoopLogger } from '../src/observability/logging.js';

describe('resolveConfig', () => {
  it('applies defaults', () => {
    const config = resolveConfig({ apiKey: 'test-key', model: 'gemini-pro' });

    expect(config.requestOptions).toEqual({
      timeout: DEFAULT_TIMEOUT,
      apiVersion: DEFAULT_API_VERSION,
      endpoint: DEFAULT_ENDPOINT,
    });
    expect(config.requestOptions.timeout).toBe(120_000);
    expect(config.authMethod).toBe('header');
    expect(config.logLevel).toBe('info');
  });

  it('strips trailing slashes from the endpoint', () => {
    const config = resolveConfig({
      apiKey: 'test-key',
      model: 'gemini-pro',
      requestOptions: { endpoint: 'https://proxy.test/base//' },
    });
    expect(config.requestOptions.endpoint).toBe('https://proxy.test/base');
  });
});

describe('validateConfig', () => {
  it('requires an API key', () => {
    expect(() => validateConfig({ apiKey: '', model: 'gemini-pro' })).toThrow(
      new InvalidConfigurationError('apiKey: API key is required')
    );
  });

  it('rejects an API version containing a slash', () => {
    expect(() =>
      validateConfig({ apiKey: 'test-key', model: 'gemini-pro', requestOptions: { apiVersion: 'v1/x' } })
    ).toThrow('Invalid configuration: requestOptions.apiVersion: must not contain "/"');
  });

  it('rejects a non-positive timeout', () => {
    expect(() =>
      validateConfig({ apiKey: 'test-key', model: 'gemini-pro', requestOptions: { timeout: -5 } })
    ).toThrow(InvalidConfigurationError);
  });

  it('rejects a timeout beyond the largest timer delay', () => {
    expect(() =>
      validateConfig({ apiKey: 'test-key', model: 'gemini-pro', requestOptions: { timeout: 3_000_000_000 } })
    ).toThrow(InvalidConfigurationError);
    expect(() =>
      validateConfig({ apiKey: 'test-key', model: 'gemini-pro', requestOptions: { timeout: 3_000_000_000 } })
    ).toThrow('requestOptions.timeout');
    expect(() =>
      validateConfig({ apiKey: 'test-key', model: 'gemini-pro', requestOptions: { timeout: MAX_TIMEOUT } })
    ).not.toThrow();
  });

  it('rejects an endpoint that is not a URL', () => {
    expect(() =>
      validateConfig({ apiKey: 'test-key', model: 'gemini-pro', requestOptions: { endpoint: 'not a url' } })
    ).toThrow(InvalidConfigurationError);
  });
});

describe('createConfigFromEnv', () => {
  it('requires a key', () => {
    expect(() => createConfigFromEnv({})).toThrow(
      'Invalid configuration: missing API key. Set GEMINI_API_KEY or GOOGLE_API_KEY environment variable.'
    );
  });

  it('falls back to GOOGLE_API_KEY and the default model', () => {
    expect(createConfigFromEnv({ GOOGLE_API_KEY: 'test-key' })).toEqual({
      apiKey: 'test-key',
      model: 'gemini-1.5-flash',
      requestOptions: {},
    });
  });

  it('reads every variable', () => {
    expect(
      createConfigFromEnv({
        GEMINI_API_KEY: 'test-key',
        GOOGLE_API_KEY: 'other-key',
        GEMINI_MODEL: 'tunedModels/tide-1',
        GEMINI_ENDPOINT: 'https://proxy.test',
        GEMINI_API_VERSION: 'v1',
        GEMINI_TIMEOUT: '2000',
        GEMINI_LOG_LEVEL: 'debug',
      })
    ).toEqual({
      apiKey: 'test-key',
      model: 'tunedModels/tide-1',
      requestOptions: { endpoint: 'https://proxy.test', apiVersion: 'v1', timeout: 2000 },
      logLevel: 'debug',
    });
  });

  it('rejects malformed values', () => {
    expect(() => createConfigFromEnv({ GEMINI_API_KEY: 'test-key', GEMINI_TIMEOUT: 'soon' })).toThrow(
      'GEMINI_TIMEOUT is not a number: soon'
    );
    expect(() => createConfigFromEnv({ GEMINI_API_KEY: 'test-key', GEMINI_TIMEOUT: '10s' })).toThrow(
      'GEMINI_TIMEOUT is not a number: 10s'
    );
    expect(() => createConfigFromEnv({ GEMINI_API_KEY: 'test-key', GEMINI_LOG_LEVEL: 'loud' })).toThrow(
      'GEMINI_LOG_LEVEL is not a log level: loud'
    );
  });
});

describe('ApiControllerBuilder', () => {
  it('requires an API key and a model', () => {
    expect(() => new ApiControllerBuilder().withModel('gemini-pro').build()).toThrow(InvalidConfigurationError);
    expect(() => new ApiControllerBuilder().withApiKey('test-key').build()).toThrow(
      'Invalid configuration: model name is required. Use withModel() to set it.'
    );
  });

  it('builds a configured controller', () => {
    const controller = new ApiControllerBuilder()
      .withApiKey('test-key')
      .withModel('gemini-pro')
      .withEndpoint('https://proxy.test')
      .withApiVersion('v1')
      .withTimeout(5000)
      .withAuthMethod('queryParam')
      .withHeaders({ 'x-request-tag': 'tests' })
      .withTransport(new MockHttpClient())
      .withLogger(new NoopLogger())
      .build();

    expect(controller.modelPath).toBe('models/gemini-pro');
    expect(controller.config.requestOptions).toEqual({
      endpoint: 'https://proxy.test',
      apiVersion: 'v1',
      timeout: 5000,
    });
    expect(controller.config.authMethod).toBe('queryParam');
    expect(controller.config.customHeaders).toEqual({ 'x-request-tag': 'tests' });
  });

  it('builds from the environment', () => {
    const controller = createControllerFromEnv({
      GEMINI_API_KEY: 'test-key',
      GEMINI_MODEL: 'tunedModels/tide-1',
      GEMINI_API_VERSION: 'v1',
      GEMINI_LOG_LEVEL: 'error',
    });

    expect(controller.modelPath).toBe('tunedModels/tide-1');
    expect(controller.config.requestOptions.apiVersion).toBe('v1');
    expect(controller.config.logLevel).toBe('error');
  });
});
