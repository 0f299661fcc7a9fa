/**
 * Token counting types.
 */

import type { Content } from './content.js';
import type { GenerateContentRequest } from './generation.js';
import type { ToolConfig } from './tools.js';

// ============================================================================
// Token Counting
// ============================================================================

/**
 * Request for token counting.
 *
 * Exactly one shape is populated: the embedded `generateContentRequest`
 * (v1beta and later) or the legacy top-level fields (v1).
 */
export interface CountTokensRequest {
  readonly generateContentRequest?: GenerateContentRequest;
  /** Legacy shape; ignored on the wire */
  readonly model?: string;
  readonly contents?: readonly Content[];
  readonly toolConfig?: ToolConfig;
  readonly systemInstruction?: Content;
}

/** Legacy request shape is used by this API version */
export const LEGACY_COUNT_TOKENS_API_VERSION = 'v1';

/**
 * Builds the count request shape the given API version accepts.
 */
export function countTokensRequestFor(
  request: GenerateContentRequest,
  apiVersion: string
): CountTokensRequest {
  if (apiVersion === LEGACY_COUNT_TOKENS_API_VERSION) {
    return {
      contents: request.contents,
      toolConfig: request.toolConfig,
      systemInstruction: request.systemInstruction,
    };
  }
  return { generateContentRequest: request };
}

export const MODALITIES = ['MODALITY_UNSPECIFIED', 'TEXT', 'IMAGE', 'VIDEO', 'AUDIO', 'DOCUMENT'] as const;

/** Input modality; unknown values decode as 'UNKNOWN' */
export type Modality = (typeof MODALITIES)[number] | 'UNKNOWN';

/** Tokens attributed to one modality */
export interface ModalityTokenCount {
  readonly modality: Modality;
  readonly tokenCount: number;
}

/** Response from token counting */
export interface CountTokensResponse {
  readonly totalTokens: number;
  readonly cachedContentTokenCount?: number;
  readonly promptTokensDetails?: readonly ModalityTokenCount[];
}
