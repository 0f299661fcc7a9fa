/**
 * Input validation for requests, applied before anything is sent.
 */

import { MAX_TIMEOUT } from '../config/index.js';
import { ValidationError, type ValidationDetail } from '../error/index.js';
import type {
  Content,
  CountTokensRequest,
  GenerateContentRequest,
  GenerationConfig,
  Part,
  ToolConfig,
} from '../types/index.js';

// ============================================================================
// Content & Part Validation
// ============================================================================

function validateContent(content: Content, fieldPath: string): ValidationDetail[] {
  if (content.parts.length === 0) {
    return [{ field: `${fieldPath}.parts`, description: 'Content must have at least one part' }];
  }

  return content.parts.flatMap((part, i) => validatePart(part, `${fieldPath}.parts[${i}]`));
}

function validatePart(part: Part, fieldPath: string): ValidationDetail[] {
  switch (part.kind) {
    case 'text':
      return part.text.length === 0
        ? [{ field: `${fieldPath}.text`, description: 'Text cannot be empty' }]
        : [];
    case 'inlineData': {
      const errors: ValidationDetail[] = [];
      if (!part.mimeType) {
        errors.push({ field: `${fieldPath}.inlineData.mimeType`, description: 'InlineData must have a MIME type' });
      }
      if (!part.data) {
        errors.push({ field: `${fieldPath}.inlineData.data`, description: 'InlineData must have data' });
      }
      return errors;
    }
    case 'fileData':
      return part.fileUri
        ? []
        : [{ field: `${fieldPath}.fileData.fileUri`, description: 'FileData must have a file URI' }];
    case 'functionCall':
      return part.name
        ? []
        : [{ field: `${fieldPath}.functionCall.name`, description: 'FunctionCall must have a name' }];
    case 'functionResponse':
      return part.name
        ? []
        : [{ field: `${fieldPath}.functionResponse.name`, description: 'FunctionResponse must have a name' }];
  }
}

function validateContents(contents: readonly Content[] | undefined, fieldPath: string): ValidationDetail[] {
  if (!contents || contents.length === 0) {
    return [{ field: fieldPath, description: 'Contents array must not be empty' }];
  }
  return contents.flatMap((content, i) => validateContent(content, `${fieldPath}[${i}]`));
}

// ============================================================================
// Generation Config Validation
// ============================================================================

function checkRange(
  field: string,
  value: number | undefined,
  min: number,
  max: number,
  integer: boolean
): ValidationDetail[] {
  if (value === undefined) {
    return [];
  }
  if (integer && !Number.isInteger(value)) {
    return [{ field, description: 'Must be an integer', value }];
  }
  if (value < min || value > max) {
    const bounds = max === Number.MAX_SAFE_INTEGER ? `at least ${min}` : `between ${min} and ${max}`;
    return [{ field, description: `Must be ${bounds}`, value }];
  }
  return [];
}

function validateGenerationConfig(config: GenerationConfig, fieldPath: string): ValidationDetail[] {
  const unbounded = Number.MAX_SAFE_INTEGER;
  return [
    ...checkRange(`${fieldPath}.temperature`, config.temperature, 0, 2, false),
    ...checkRange(`${fieldPath}.topP`, config.topP, 0, 1, false),
    ...checkRange(`${fieldPath}.topK`, config.topK, 1, unbounded, true),
    ...checkRange(`${fieldPath}.candidateCount`, config.candidateCount, 1, unbounded, true),
    ...checkRange(`${fieldPath}.maxOutputTokens`, config.maxOutputTokens, 1, unbounded, true),
  ];
}

function validateToolConfig(config: ToolConfig, fieldPath: string): ValidationDetail[] {
  const calling = config.functionCallingConfig;
  if (calling?.allowedFunctionNames && calling.mode !== 'ANY') {
    return [
      {
        field: `${fieldPath}.functionCallingConfig.allowedFunctionNames`,
        description: 'Allowed function names can only be set with mode ANY',
        value: calling.mode,
      },
    ];
  }
  return [];
}

// ============================================================================
// Request Validation
// ============================================================================

function collectGenerateContentErrors(request: GenerateContentRequest, prefix: string): ValidationDetail[] {
  const errors = validateContents(request.contents, `${prefix}contents`);

  if (request.systemInstruction) {
    errors.push(...validateContent(request.systemInstruction, `${prefix}systemInstruction`));
  }
  if (request.generationConfig) {
    errors.push(...validateGenerationConfig(request.generationConfig, `${prefix}generationConfig`));
  }
  if (request.toolConfig) {
    errors.push(...validateToolConfig(request.toolConfig, `${prefix}toolConfig`));
  }
  request.tools?.forEach((tool, i) => {
    tool.functionDeclarations?.forEach((declaration, j) => {
      if (!declaration.name) {
        errors.push({
          field: `${prefix}tools[${i}].functionDeclarations[${j}].name`,
          description: 'Function declaration must have a name',
        });
      }
    });
  });

  return errors;
}

/**
 * Validates a GenerateContentRequest.
 *
 * @throws {ValidationError} If validation fails
 */
export function validateGenerateContentRequest(request: GenerateContentRequest): void {
  const errors = collectGenerateContentErrors(request, '');
  if (errors.length > 0) {
    throw new ValidationError('Invalid GenerateContentRequest', errors);
  }
}

/**
 * Validates a CountTokensRequest: exactly one of the embedded and the legacy
 * shape must be populated.
 *
 * @throws {ValidationError} If validation fails
 */
export function validateCountTokensRequest(request: CountTokensRequest): void {
  const hasLegacy =
    request.contents !== undefined || request.toolConfig !== undefined || request.systemInstruction !== undefined;
  let errors: ValidationDetail[];

  if (request.generateContentRequest && hasLegacy) {
    errors = [
      {
        field: 'generateContentRequest',
        description: 'Set either generateContentRequest or contents, not both',
      },
    ];
  } else if (request.generateContentRequest) {
    errors = collectGenerateContentErrors(request.generateContentRequest, 'generateContentRequest.');
  } else {
    errors = validateContents(request.contents, 'contents');
    if (request.systemInstruction) {
      errors.push(...validateContent(request.systemInstruction, 'systemInstruction'));
    }
    if (request.toolConfig) {
      errors.push(...validateToolConfig(request.toolConfig, 'toolConfig'));
    }
  }

  if (errors.length > 0) {
    throw new ValidationError('Invalid CountTokensRequest', errors);
  }
}

// ============================================================================
// Model Name Validation
// ============================================================================

/**
 * Validates a model name.
 *
 * @throws {ValidationError} If model name is invalid
 */
export function validateModelName(model: string): void {
  if (model.trim().length === 0) {
    throw new ValidationError('Invalid model name', [
      { field: 'model', description: 'Model name cannot be empty or whitespace' },
    ]);
  }
}

// ============================================================================
// Call Option Validation
// ============================================================================

/**
 * Validates a per-call timeout override.
 *
 * @throws {ValidationError} If the timeout is not an integer in 1..2^31-1
 */
export function validateTimeout(timeout: number | undefined): void {
  if (timeout === undefined) {
    return;
  }
  const errors = checkRange('timeout', timeout, 1, MAX_TIMEOUT, true);
  if (errors.length > 0) {
    throw new ValidationError('Invalid call options', errors);
  }
}
