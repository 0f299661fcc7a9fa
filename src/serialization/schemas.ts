/**
 * zod schemas for wire objects.
 *
 * Every object schema accepts a known key in snake_case or camelCase and
 * strips keys it does not know.
 */

import { z } from 'zod';
import {
  BLOCK_REASONS,
  FINISH_REASONS,
  FUNCTION_CALLING_MODES,
  HARM_BLOCK_THRESHOLDS,
  HARM_CATEGORIES,
  HARM_PROBABILITIES,
  MODALITIES,
  type Part,
} from '../types/index.js';
import { fromWireKey } from './wire-keys.js';

/** Part variant keys, in their field spelling */
export const PART_VARIANT_KEYS = ['text', 'inlineData', 'functionCall', 'functionResponse', 'fileData'] as const;

function normalizeKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    out[fromWireKey(key) ?? key] = entry;
  }
  return out;
}

function wireObject<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess(normalizeKeys, z.object(shape));
}

/**
 * String enum that maps values it does not know to 'UNKNOWN'.
 */
function lenientEnum<T extends string>(values: readonly T[]) {
  const known = new Set<string>(values);
  const isKnown = (value: string): value is T => known.has(value);
  return z.string().transform((value): T | 'UNKNOWN' => (isKnown(value) ? value : 'UNKNOWN'));
}

const jsonObjectSchema = z.record(z.unknown());

// ============================================================================
// Content
// ============================================================================

const blobSchema = wireObject({ mimeType: z.string(), data: z.string() });
const functionCallSchema = wireObject({ name: z.string(), args: jsonObjectSchema.default({}) });
const functionResponseSchema = wireObject({ name: z.string(), response: jsonObjectSchema });
const fileDataSchema = wireObject({ mimeType: z.string().optional(), fileUri: z.string() });

export const partSchema = wireObject({
  text: z.string().optional(),
  inlineData: blobSchema.optional(),
  functionCall: functionCallSchema.optional(),
  functionResponse: functionResponseSchema.optional(),
  fileData: fileDataSchema.optional(),
}).transform((wire, ctx): Part => {
  const present = PART_VARIANT_KEYS.filter((key) => wire[key] !== undefined);
  if (present.length !== 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message:
        present.length === 0
          ? `part has none of ${PART_VARIANT_KEYS.join(', ')}`
          : `part has more than one variant: ${present.join(', ')}`,
    });
    return z.NEVER;
  }

  if (wire.text !== undefined) {
    return { kind: 'text', text: wire.text };
  }
  if (wire.inlineData) {
    return { kind: 'inlineData', mimeType: wire.inlineData.mimeType, data: wire.inlineData.data };
  }
  if (wire.functionCall) {
    return { kind: 'functionCall', name: wire.functionCall.name, args: wire.functionCall.args };
  }
  if (wire.functionResponse) {
    return {
      kind: 'functionResponse',
      name: wire.functionResponse.name,
      response: wire.functionResponse.response,
    };
  }
  if (wire.fileData) {
    const { fileUri, mimeType } = wire.fileData;
    return mimeType === undefined ? { kind: 'fileData', fileUri } : { kind: 'fileData', fileUri, mimeType };
  }
  return z.NEVER;
});

export const contentSchema = wireObject({
  role: z.string().optional(),
  parts: z.array(partSchema).default([]),
});

// ============================================================================
// Request-side configuration
// ============================================================================

export const generationConfigSchema = wireObject({
  temperature: z.number().optional(),
  topK: z.number().int().optional(),
  topP: z.number().optional(),
  candidateCount: z.number().int().optional(),
  maxOutputTokens: z.number().int().optional(),
  stopSequences: z.array(z.string()).optional(),
  responseMimeType: z.string().optional(),
});

export const safetySettingSchema = wireObject({
  category: z.enum(HARM_CATEGORIES),
  threshold: z.enum(HARM_BLOCK_THRESHOLDS),
});

export const toolConfigSchema = wireObject({
  functionCallingConfig: wireObject({
    mode: z.enum(FUNCTION_CALLING_MODES),
    allowedFunctionNames: z.array(z.string()).optional(),
  }).optional(),
});

// ============================================================================
// Responses
// ============================================================================

const safetyRatingSchema = wireObject({
  category: lenientEnum(HARM_CATEGORIES),
  probability: lenientEnum(HARM_PROBABILITIES),
  blocked: z.boolean().optional(),
});

const citationSourceSchema = wireObject({
  startIndex: z.number().int().optional(),
  endIndex: z.number().int().optional(),
  uri: z.string().optional(),
  license: z.string().optional(),
});

const candidateSchema = wireObject({
  content: contentSchema.optional(),
  finishReason: lenientEnum(FINISH_REASONS).optional(),
  safetyRatings: z.array(safetyRatingSchema).optional(),
  citationMetadata: wireObject({
    citationSources: z.array(citationSourceSchema).default([]),
  }).optional(),
  index: z.number().int().optional(),
  tokenCount: z.number().int().optional(),
});

const promptFeedbackSchema = wireObject({
  blockReason: lenientEnum(BLOCK_REASONS).optional(),
  safetyRatings: z.array(safetyRatingSchema).optional(),
});

const usageMetadataSchema = wireObject({
  promptTokenCount: z.number().int().optional(),
  candidatesTokenCount: z.number().int().optional(),
  totalTokenCount: z.number().int().optional(),
  cachedContentTokenCount: z.number().int().optional(),
});

export const generateContentResponseSchema = wireObject({
  candidates: z.array(candidateSchema).optional(),
  promptFeedback: promptFeedbackSchema.optional(),
  usageMetadata: usageMetadataSchema.optional(),
});

export const countTokensResponseSchema = wireObject({
  totalTokens: z.number().int(),
  cachedContentTokenCount: z.number().int().optional(),
  promptTokensDetails: z
    .array(wireObject({ modality: lenientEnum(MODALITIES), tokenCount: z.number().int().default(0) }))
    .optional(),
});
