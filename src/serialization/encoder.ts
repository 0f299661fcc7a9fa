/**
 * Encoders from request types to the snake_case wire format.
 *
 * Unset fields are omitted, never written as null. The `model` field of a
 * request is never written: the model travels in the URL path.
 */

import type {
  Content,
  CountTokensRequest,
  FunctionCallingConfig,
  FunctionDeclaration,
  GenerateContentRequest,
  GenerationConfig,
  Part,
  SafetySetting,
  Tool,
  ToolConfig,
} from '../types/index.js';
import { type FieldName, isFieldName, toWireKey } from './wire-keys.js';

/** JSON object as written to the wire */
export type WireObject = Record<string, unknown>;

type WireFields = Partial<Record<FieldName, unknown>>;

/**
 * Writes the given fields under their wire keys, skipping unset values.
 */
export function writeFields(fields: WireFields): WireObject {
  const out: WireObject = {};
  for (const [field, value] of Object.entries(fields)) {
    if (value !== undefined && value !== null && isFieldName(field)) {
      out[toWireKey(field)] = value;
    }
  }
  return out;
}

function mapOptional<T, R>(values: readonly T[] | undefined, encode: (value: T) => R): R[] | undefined {
  return values?.map(encode);
}

export function encodePart(part: Part): WireObject {
  switch (part.kind) {
    case 'text':
      return writeFields({ text: part.text });
    case 'inlineData':
      return writeFields({
        inlineData: writeFields({ mimeType: part.mimeType, data: part.data }),
      });
    case 'functionCall':
      return writeFields({
        functionCall: writeFields({ name: part.name, args: part.args }),
      });
    case 'functionResponse':
      return writeFields({
        functionResponse: writeFields({ name: part.name, response: part.response }),
      });
    case 'fileData':
      return writeFields({
        fileData: writeFields({ mimeType: part.mimeType, fileUri: part.fileUri }),
      });
    default: {
      const unreachable: never = part;
      return unreachable;
    }
  }
}

export function encodeContent(content: Content): WireObject {
  return writeFields({
    role: content.role,
    parts: content.parts.map(encodePart),
  });
}

export function encodeGenerationConfig(config: GenerationConfig): WireObject {
  return writeFields({
    temperature: config.temperature,
    topK: config.topK,
    topP: config.topP,
    candidateCount: config.candidateCount,
    maxOutputTokens: config.maxOutputTokens,
    stopSequences: config.stopSequences ? [...config.stopSequences] : undefined,
    responseMimeType: config.responseMimeType,
  });
}

export function encodeSafetySetting(setting: SafetySetting): WireObject {
  return writeFields({ category: setting.category, threshold: setting.threshold });
}

function encodeFunctionDeclaration(declaration: FunctionDeclaration): WireObject {
  return writeFields({
    name: declaration.name,
    description: declaration.description,
    parameters: declaration.parameters,
  });
}

export function encodeTool(tool: Tool): WireObject {
  return writeFields({
    functionDeclarations: mapOptional(tool.functionDeclarations, encodeFunctionDeclaration),
  });
}

function encodeFunctionCallingConfig(config: FunctionCallingConfig): WireObject {
  return writeFields({
    mode: config.mode,
    allowedFunctionNames: config.allowedFunctionNames ? [...config.allowedFunctionNames] : undefined,
  });
}

export function encodeToolConfig(config: ToolConfig): WireObject {
  return writeFields({
    functionCallingConfig: config.functionCallingConfig
      ? encodeFunctionCallingConfig(config.functionCallingConfig)
      : undefined,
  });
}

/**
 * Encodes a generate request. `request.model` is dropped.
 */
export function encodeGenerateContentRequest(request: GenerateContentRequest): WireObject {
  return writeFields({
    contents: request.contents.map(encodeContent),
    safetySettings: mapOptional(request.safetySettings, encodeSafetySetting),
    generationConfig: request.generationConfig ? encodeGenerationConfig(request.generationConfig) : undefined,
    tools: mapOptional(request.tools, encodeTool),
    toolConfig: request.toolConfig ? encodeToolConfig(request.toolConfig) : undefined,
    systemInstruction: request.systemInstruction ? encodeContent(request.systemInstruction) : undefined,
  });
}

/**
 * Encodes a count request in whichever shape it carries. Neither the
 * legacy `model` nor the embedded request's `model` is written.
 */
export function encodeCountTokensRequest(request: CountTokensRequest): WireObject {
  return writeFields({
    generateContentRequest: request.generateContentRequest
      ? encodeGenerateContentRequest(request.generateContentRequest)
      : undefined,
    contents: mapOptional(request.contents, encodeContent),
    toolConfig: request.toolConfig ? encodeToolConfig(request.toolConfig) : undefined,
    systemInstruction: request.systemInstruction ? encodeContent(request.systemInstruction) : undefined,
  });
}

/**
 * JSON text of an encoded request.
 */
export function serializeRequest(encoded: WireObject): string {
  return JSON.stringify(encoded);
}
