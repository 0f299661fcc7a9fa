/**
 * Decoders from wire JSON to typed values.
 *
 * Each decoder takes JSON text or an already parsed value and throws
 * SerializationError when the input does not match the expected shape.
 */

import type { z } from 'zod';
import { SerializationError } from '../error/index.js';
import type {
  Content,
  CountTokensResponse,
  GenerateContentResponse,
  GenerationConfig,
  Part,
  SafetySetting,
  ToolConfig,
} from '../types/index.js';
import {
  contentSchema,
  countTokensResponseSchema,
  generateContentResponseSchema,
  generationConfigSchema,
  partSchema,
  safetySettingSchema,
  toolConfigSchema,
} from './schemas.js';

const MAX_PREVIEW_LENGTH = 200;

/**
 * Parses JSON text.
 */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SerializationError(`Invalid JSON: ${reason}`, {
      cause: error,
      details: { preview: text.substring(0, MAX_PREVIEW_LENGTH) },
    });
  }
}

function decodeWith<S extends z.ZodTypeAny>(schema: S, input: unknown, target: string): z.output<S> {
  const value = typeof input === 'string' ? parseJson(input) : input;
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new SerializationError(`Cannot decode ${target}: ${issues.join('; ')}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export function decodePart(input: unknown): Part {
  return decodeWith(partSchema, input, 'Part');
}

export function decodeContent(input: unknown): Content {
  return decodeWith(contentSchema, input, 'Content');
}

export function decodeGenerationConfig(input: unknown): GenerationConfig {
  return decodeWith(generationConfigSchema, input, 'GenerationConfig');
}

export function decodeSafetySetting(input: unknown): SafetySetting {
  return decodeWith(safetySettingSchema, input, 'SafetySetting');
}

export function decodeToolConfig(input: unknown): ToolConfig {
  return decodeWith(toolConfigSchema, input, 'ToolConfig');
}

export function decodeGenerateContentResponse(input: unknown): GenerateContentResponse {
  return decodeWith(generateContentResponseSchema, input, 'GenerateContentResponse');
}

export function decodeCountTokensResponse(input: unknown): CountTokensResponse {
  return decodeWith(countTokensResponseSchema, input, 'CountTokensResponse');
}
