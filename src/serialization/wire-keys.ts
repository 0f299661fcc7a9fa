/**
 * Field name ↔ wire key table.
 *
 * Requests are written with snake_case keys. Responses arrive in camelCase,
 * so decoding accepts both spellings of every field listed here.
 */

import { SerializationError } from '../error/index.js';

const FIELD_NAMES = [
  // requests
  'contents',
  'safetySettings',
  'generationConfig',
  'tools',
  'toolConfig',
  'systemInstruction',
  'generateContentRequest',
  // content
  'role',
  'parts',
  'text',
  'inlineData',
  'mimeType',
  'data',
  'functionCall',
  'functionResponse',
  'name',
  'args',
  'response',
  'fileData',
  'fileUri',
  // generation config
  'temperature',
  'topK',
  'topP',
  'candidateCount',
  'maxOutputTokens',
  'stopSequences',
  'responseMimeType',
  // safety
  'category',
  'threshold',
  'probability',
  'blocked',
  // tools
  'functionDeclarations',
  'description',
  'parameters',
  'functionCallingConfig',
  'mode',
  'allowedFunctionNames',
  // responses
  'candidates',
  'promptFeedback',
  'usageMetadata',
  'content',
  'finishReason',
  'safetyRatings',
  'citationMetadata',
  'citationSources',
  'startIndex',
  'endIndex',
  'uri',
  'license',
  'index',
  'tokenCount',
  'blockReason',
  'promptTokenCount',
  'candidatesTokenCount',
  'totalTokenCount',
  'cachedContentTokenCount',
  'totalTokens',
  'promptTokensDetails',
  'modality',
] as const;

/** A field name the serializer knows */
export type FieldName = (typeof FIELD_NAMES)[number];

/** Derives the snake_case spelling of a camelCase name. */
export function snakeCase(name: string): string {
  return name.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

const WIRE_KEY_BY_FIELD: ReadonlyMap<string, string> = new Map(
  FIELD_NAMES.map((field): [string, string] => [field, snakeCase(field)])
);

const FIELD_BY_WIRE_KEY: ReadonlyMap<string, FieldName> = new Map(
  FIELD_NAMES.flatMap((field): Array<[string, FieldName]> => [
    [snakeCase(field), field],
    [field, field],
  ])
);

/**
 * Wire key for a field, e.g. `generationConfig` → `generation_config`.
 */
export function toWireKey(field: FieldName): string {
  const key = WIRE_KEY_BY_FIELD.get(field);
  if (key === undefined) {
    throw new SerializationError(`No wire key for field '${field}'`);
  }
  return key;
}

export function isFieldName(name: string): name is FieldName {
  return WIRE_KEY_BY_FIELD.has(name);
}

/**
 * Field name for a wire key in either spelling, or undefined if unknown.
 */
export function fromWireKey(key: string): FieldName | undefined {
  return FIELD_BY_WIRE_KEY.get(key);
}
