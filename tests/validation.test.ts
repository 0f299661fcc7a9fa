/**
 * Request validation tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../src/error/index.js';
import { countTokensRequestFor, inlineDataPart, userContent, type GenerateContentRequest } from '../src/types/index.js';
import {
  validateCountTokensRequest,
  validateGenerateContentRequest,
  validateModelName,
  validateTimeout,
} from '../src/validation/index.js';

function detailsOf(run: () => void): unknown {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.validationDetails;
    }
    throw error;
  }
  return [];
}

const valid: GenerateContentRequest = { contents: [userContent('Hello')] };

describe('validateGenerateContentRequest', () => {
  it('accepts a minimal request', () => {
    expect(() => validateGenerateContentRequest(valid)).not.toThrow();
  });

  it('requires contents', () => {
    expect(detailsOf(() => validateGenerateContentRequest({ contents: [] }))).toEqual([
      { field: 'contents', description: 'Contents array must not be empty' },
    ]);
  });

  it('checks parts', () => {
    expect(
      detailsOf(() =>
        validateGenerateContentRequest({ contents: [{ parts: [] }, userContent('', inlineDataPart('', 'AAAA'))] })
      )
    ).toEqual([
      { field: 'contents[0].parts', description: 'Content must have at least one part' },
      { field: 'contents[1].parts[0].text', description: 'Text cannot be empty' },
      { field: 'contents[1].parts[1].inlineData.mimeType', description: 'InlineData must have a MIME type' },
    ]);
  });

  it('checks generation config ranges', () => {
    expect(
      detailsOf(() =>
        validateGenerateContentRequest({
          ...valid,
          generationConfig: { temperature: 2.5, topP: 0.5, topK: 1.5, maxOutputTokens: 0 },
        })
      )
    ).toEqual([
      { field: 'generationConfig.temperature', description: 'Must be between 0 and 2', value: 2.5 },
      { field: 'generationConfig.topK', description: 'Must be an integer', value: 1.5 },
      { field: 'generationConfig.maxOutputTokens', description: 'Must be at least 1', value: 0 },
    ]);
  });

  it('allows function names only with mode ANY', () => {
    expect(() =>
      validateGenerateContentRequest({
        ...valid,
        toolConfig: { functionCallingConfig: { mode: 'ANY', allowedFunctionNames: ['get_tide'] } },
      })
    ).not.toThrow();
    expect(
      detailsOf(() =>
        validateGenerateContentRequest({
          ...valid,
          toolConfig: { functionCallingConfig: { mode: 'AUTO', allowedFunctionNames: ['get_tide'] } },
        })
      )
    ).toEqual([
      {
        field: 'toolConfig.functionCallingConfig.allowedFunctionNames',
        description: 'Allowed function names can only be set with mode ANY',
        value: 'AUTO',
      },
    ]);
  });

  it('requires function declaration names', () => {
    expect(
      detailsOf(() =>
        validateGenerateContentRequest({ ...valid, tools: [{ functionDeclarations: [{ name: '', description: 'x' }] }] })
      )
    ).toEqual([{ field: 'tools[0].functionDeclarations[0].name', description: 'Function declaration must have a name' }]);
  });

  it('reports through ValidationError', () => {
    expect(() => validateGenerateContentRequest({ contents: [] })).toThrow(
      'Validation error: Invalid GenerateContentRequest'
    );
  });
});

describe('validateCountTokensRequest', () => {
  it('accepts both shapes', () => {
    expect(() => validateCountTokensRequest(countTokensRequestFor(valid, 'v1'))).not.toThrow();
    expect(() => validateCountTokensRequest(countTokensRequestFor(valid, 'v1beta'))).not.toThrow();
  });

  it('rejects both shapes at once', () => {
    expect(
      detailsOf(() => validateCountTokensRequest({ generateContentRequest: valid, contents: valid.contents }))
    ).toEqual([{ field: 'generateContentRequest', description: 'Set either generateContentRequest or contents, not both' }]);
  });

  it('prefixes fields of the embedded request', () => {
    expect(detailsOf(() => validateCountTokensRequest({ generateContentRequest: { contents: [] } }))).toEqual([
      { field: 'generateContentRequest.contents', description: 'Contents array must not be empty' },
    ]);
  });

  it('rejects an empty request', () => {
    expect(() => validateCountTokensRequest({})).toThrow('Validation error: Invalid CountTokensRequest');
  });
});

describe('validateModelName', () => {
  it('rejects blank names', () => {
    expect(() => validateModelName('   ')).toThrow(ValidationError);
    expect(() => validateModelName('gemini-pro')).not.toThrow();
  });
});

describe('validateTimeout', () => {
  it('accepts an unset timeout and the bounds', () => {
    expect(() => validateTimeout(undefined)).not.toThrow();
    expect(() => validateTimeout(1)).not.toThrow();
    expect(() => validateTimeout(2_147_483_647)).not.toThrow();
  });

  it('rejects values a timer cannot hold', () => {
    expect(() => validateTimeout(0)).toThrow('Validation error: Invalid call options');
    expect(() => validateTimeout(-5)).toThrow(ValidationError);
    expect(() => validateTimeout(2_147_483_648)).toThrow(ValidationError);
  });

  it('reports the offending value', () => {
    try {
      validateTimeout(Number.NaN);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        validationDetails: [{ field: 'timeout', description: 'Must be an integer', value: Number.NaN }],
      });
    }
  });
});
