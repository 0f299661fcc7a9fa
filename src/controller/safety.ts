/**
 * Safety inspection of generate responses.
 *
 * A blocked prompt or candidate is a normal response, not an error. These
 * helpers let the caller detect the block without throwing.
 */

import type {
  FinishReason,
  GenerateContentResponse,
  HarmProbability,
  SafetyRating,
} from '../types/index.js';

/** Finish reasons that mean the candidate was withheld */
const BLOCKING_FINISH_REASONS: ReadonlySet<FinishReason> = new Set<FinishReason>([
  'SAFETY',
  'RECITATION',
  'BLOCKLIST',
  'PROHIBITED_CONTENT',
  'SPII',
]);

const PROBABILITY_RANK: Partial<Record<HarmProbability, number>> = {
  NEGLIGIBLE: 1,
  LOW: 2,
  MEDIUM: 3,
  HIGH: 4,
};

/**
 * Whether the prompt was blocked or any candidate stopped for a safety
 * related reason.
 */
export function isBlocked(response: GenerateContentResponse): boolean {
  if (response.promptFeedback?.blockReason !== undefined) {
    return true;
  }
  return (response.candidates ?? []).some(
    (candidate) => candidate.finishReason !== undefined && BLOCKING_FINISH_REASONS.has(candidate.finishReason)
  );
}

/**
 * The highest-probability rating, or undefined for an empty list.
 */
export function primaryRating(ratings: readonly SafetyRating[] | undefined): SafetyRating | undefined {
  let primary: SafetyRating | undefined;
  for (const rating of ratings ?? []) {
    if (!primary || (PROBABILITY_RANK[rating.probability] ?? 0) > (PROBABILITY_RANK[primary.probability] ?? 0)) {
      primary = rating;
    }
  }
  return primary;
}

/** Summary of a response's safety state, for logging */
export interface SafetySummary {
  promptBlocked: boolean;
  responseBlocked: boolean;
  ratings: SafetyRating[];
}

/**
 * Gets a summary of safety ratings from a response.
 */
export function getSafetySummary(response: GenerateContentResponse): SafetySummary {
  const candidates = response.candidates ?? [];
  return {
    promptBlocked: response.promptFeedback?.blockReason !== undefined,
    responseBlocked: candidates.some(
      (candidate) => candidate.finishReason !== undefined && BLOCKING_FINISH_REASONS.has(candidate.finishReason)
    ),
    ratings: [...(response.promptFeedback?.safetyRatings ?? []), ...candidates.flatMap((c) => c.safetyRatings ?? [])],
  };
}
