/**
 * Generation-related types.
 */

import type { Content } from './content.js';
import type { SafetyRating, SafetySetting } from './safety.js';
import type { Tool, ToolConfig } from './tools.js';

// ============================================================================
// Request
// ============================================================================

/** Sampling parameters; an unset field means the server default */
export interface GenerationConfig {
  /** 0.0 - 2.0 */
  readonly temperature?: number;
  /** Positive integer */
  readonly topK?: number;
  /** 0.0 - 1.0 */
  readonly topP?: number;
  readonly candidateCount?: number;
  readonly maxOutputTokens?: number;
  /** Duplicates are sent as given */
  readonly stopSequences?: readonly string[];
  /** e.g. "text/plain" or "application/json" */
  readonly responseMimeType?: string;
}

/** Request for content generation */
export interface GenerateContentRequest {
  /**
   * Ignored on the wire: the model travels in the URL path.
   */
  readonly model?: string;
  readonly contents: readonly Content[];
  readonly safetySettings?: readonly SafetySetting[];
  readonly generationConfig?: GenerationConfig;
  readonly tools?: readonly Tool[];
  readonly toolConfig?: ToolConfig;
  readonly systemInstruction?: Content;
}

// ============================================================================
// Response
// ============================================================================

export const FINISH_REASONS = [
  'FINISH_REASON_UNSPECIFIED',
  'STOP',
  'MAX_TOKENS',
  'SAFETY',
  'RECITATION',
  'LANGUAGE',
  'OTHER',
  'BLOCKLIST',
  'PROHIBITED_CONTENT',
  'SPII',
  'MALFORMED_FUNCTION_CALL',
] as const;

/** Why a candidate stopped; unknown values decode as 'UNKNOWN' */
export type FinishReason = (typeof FINISH_REASONS)[number] | 'UNKNOWN';

export const BLOCK_REASONS = [
  'BLOCK_REASON_UNSPECIFIED',
  'SAFETY',
  'OTHER',
  'BLOCKLIST',
  'PROHIBITED_CONTENT',
] as const;

/** Why the prompt was blocked; unknown values decode as 'UNKNOWN' */
export type BlockReason = (typeof BLOCK_REASONS)[number] | 'UNKNOWN';

/** Prompt feedback */
export interface PromptFeedback {
  readonly blockReason?: BlockReason;
  readonly safetyRatings?: readonly SafetyRating[];
}

/** Usage metadata */
export interface UsageMetadata {
  readonly promptTokenCount?: number;
  readonly candidatesTokenCount?: number;
  readonly totalTokenCount?: number;
  readonly cachedContentTokenCount?: number;
}

/** Citation source */
export interface CitationSource {
  readonly startIndex?: number;
  readonly endIndex?: number;
  readonly uri?: string;
  readonly license?: string;
}

/** Citation metadata */
export interface CitationMetadata {
  readonly citationSources: readonly CitationSource[];
}

/** Response candidate */
export interface Candidate {
  readonly content?: Content;
  readonly finishReason?: FinishReason;
  readonly safetyRatings?: readonly SafetyRating[];
  readonly citationMetadata?: CitationMetadata;
  readonly index?: number;
  readonly tokenCount?: number;
}

/** Response from content generation */
export interface GenerateContentResponse {
  readonly candidates?: readonly Candidate[];
  readonly promptFeedback?: PromptFeedback;
  readonly usageMetadata?: UsageMetadata;
}
