/**
 * Accessors and checks over decoded generate responses.
 */

import { SerializationError } from '../error/index.js';
import type { FunctionCallPart, GenerateContentResponse } from '../types/index.js';
import { isFunctionCallPart, isTextPart } from '../types/index.js';

/**
 * Concatenated text parts of the first candidate, or '' when there are none.
 */
export function responseText(response: GenerateContentResponse): string {
  const parts = response.candidates?.[0]?.content?.parts ?? [];
  return parts
    .filter(isTextPart)
    .map((part) => part.text)
    .join('');
}

/**
 * Function calls requested by the first candidate, in order.
 */
export function functionCalls(response: GenerateContentResponse): FunctionCallPart[] {
  const parts = response.candidates?.[0]?.content?.parts ?? [];
  return parts.filter(isFunctionCallPart);
}

/**
 * Rejects a response that carries neither candidates nor prompt feedback.
 * A blocked prompt arrives without candidates but with a block reason or
 * ratings in its feedback, and is passed through.
 *
 * @throws {SerializationError} for a response with nothing in it
 */
export function ensureCandidates(response: GenerateContentResponse): GenerateContentResponse {
  const hasCandidates = response.candidates !== undefined && response.candidates.length > 0;
  const feedback = response.promptFeedback;
  const hasFeedback = feedback?.blockReason !== undefined || (feedback?.safetyRatings?.length ?? 0) > 0;
  if (!hasCandidates && !hasFeedback) {
    throw new SerializationError('Response has no candidates and no prompt feedback', {
      details: { usageMetadata: response.usageMetadata },
    });
  }
  return response;
}
