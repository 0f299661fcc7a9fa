/**
 * Safety and response accessor tests
 */

import { describe, it, expect } from 'vitest';
import { loadJsonFixture } from '../src/__fixtures__/index.js';
import {
  ensureCandidates,
  functionCalls,
  getSafetySummary,
  isBlocked,
  primaryRating,
  responseText,
} from '../src/controller/index.js';
import { SerializationError } from '../src/error/index.js';
import { decodeGenerateContentResponse } from '../src/serialization/index.js';
import type { GenerateContentResponse } from '../src/types/index.js';

describe('isBlocked', () => {
  it('reports a blocked prompt', () => {
    expect(isBlocked(decodeGenerateContentResponse(loadJsonFixture('content/prompt-blocked.json')))).toBe(true);
  });

  it('reports a candidate withheld for recitation', () => {
    const response: GenerateContentResponse = { candidates: [{ finishReason: 'RECITATION' }] };
    expect(isBlocked(response)).toBe(true);
  });

  it('passes a normal response', () => {
    expect(isBlocked(decodeGenerateContentResponse(loadJsonFixture('content/success-response.json')))).toBe(false);
  });
});

describe('primaryRating', () => {
  it('picks the first rating with the highest probability', () => {
    expect(
      primaryRating([
        { category: 'HARM_CATEGORY_HARASSMENT', probability: 'LOW' },
        { category: 'HARM_CATEGORY_DANGEROUS_CONTENT', probability: 'HIGH' },
        { category: 'HARM_CATEGORY_HATE_SPEECH', probability: 'HIGH' },
      ])
    ).toEqual({ category: 'HARM_CATEGORY_DANGEROUS_CONTENT', probability: 'HIGH' });
    expect(primaryRating([])).toBeUndefined();
  });
});

describe('getSafetySummary', () => {
  it('collects prompt and candidate ratings', () => {
    expect(getSafetySummary(decodeGenerateContentResponse(loadJsonFixture('content/prompt-blocked.json')))).toEqual({
      promptBlocked: true,
      responseBlocked: false,
      ratings: [{ category: 'HARM_CATEGORY_DANGEROUS_CONTENT', probability: 'HIGH', blocked: true }],
    });
  });
});

describe('response accessors', () => {
  it('return empty values for a response without candidates', () => {
    const response: GenerateContentResponse = { promptFeedback: { blockReason: 'OTHER' } };
    expect(responseText(response)).toBe('');
    expect(functionCalls(response)).toEqual([]);
    expect(ensureCandidates(response)).toBe(response);
  });

  it('ensureCandidates rejects an empty response', () => {
    expect(() => ensureCandidates({})).toThrow(SerializationError);
  });

  it('ensureCandidates rejects feedback with neither a block reason nor ratings', () => {
    expect(() => ensureCandidates({ promptFeedback: {} })).toThrow(SerializationError);
    expect(() => ensureCandidates({ candidates: [], promptFeedback: { safetyRatings: [] } })).toThrow(
      SerializationError
    );
  });

  it('ensureCandidates accepts feedback that carries ratings', () => {
    const response: GenerateContentResponse = {
      promptFeedback: { safetyRatings: [{ category: 'HARM_CATEGORY_HARASSMENT', probability: 'LOW' }] },
    };
    expect(ensureCandidates(response)).toBe(response);
  });
});
