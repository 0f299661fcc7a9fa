/**
 * Safety-related types.
 */

// ============================================================================
// Safety Settings
// ============================================================================

/** Harm categories the service knows */
export const HARM_CATEGORIES = [
  'HARM_CATEGORY_HARASSMENT',
  'HARM_CATEGORY_HATE_SPEECH',
  'HARM_CATEGORY_SEXUALLY_EXPLICIT',
  'HARM_CATEGORY_DANGEROUS_CONTENT',
  'HARM_CATEGORY_CIVIC_INTEGRITY',
] as const;

/** Harm category; decoded values outside the list become 'UNKNOWN' */
export type HarmCategory = (typeof HARM_CATEGORIES)[number] | 'UNKNOWN';

export const HARM_BLOCK_THRESHOLDS = [
  'BLOCK_NONE',
  'BLOCK_LOW_AND_ABOVE',
  'BLOCK_MEDIUM_AND_ABOVE',
  'BLOCK_ONLY_HIGH',
] as const;

/** Threshold for blocking harmful content */
export type HarmBlockThreshold = (typeof HARM_BLOCK_THRESHOLDS)[number];

/** Safety setting configuration */
export interface SafetySetting {
  readonly category: Exclude<HarmCategory, 'UNKNOWN'>;
  readonly threshold: HarmBlockThreshold;
}

// ============================================================================
// Safety Ratings
// ============================================================================

export const HARM_PROBABILITIES = ['NEGLIGIBLE', 'LOW', 'MEDIUM', 'HIGH'] as const;

/** Harm probability level */
export type HarmProbability = (typeof HARM_PROBABILITIES)[number] | 'UNKNOWN';

/** Safety rating for content */
export interface SafetyRating {
  readonly category: HarmCategory;
  readonly probability: HarmProbability;
  readonly blocked?: boolean;
}
