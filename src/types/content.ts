/**
 * Content-related types.
 */

// ============================================================================
// Content Parts
// ============================================================================

/** JSON object passed through without interpretation */
export type JsonObject = { readonly [key: string]: unknown };

/** Text content part */
export interface TextPart {
  readonly kind: 'text';
  readonly text: string;
}

/** Inline binary data part */
export interface InlineDataPart {
  readonly kind: 'inlineData';
  readonly mimeType: string;
  /** Base64-encoded bytes */
  readonly data: string;
}

/** Function call from the model */
export interface FunctionCallPart {
  readonly kind: 'functionCall';
  readonly name: string;
  readonly args: JsonObject;
}

/** Function result sent back by the caller */
export interface FunctionResponsePart {
  readonly kind: 'functionResponse';
  readonly name: string;
  readonly response: JsonObject;
}

/** Reference to an uploaded file */
export interface FileDataPart {
  readonly kind: 'fileData';
  readonly mimeType?: string;
  readonly fileUri: string;
}

/** Union of all part types */
export type Part = TextPart | InlineDataPart | FunctionCallPart | FunctionResponsePart | FileDataPart;

/** Discriminator values of Part */
export type PartKind = Part['kind'];

// ============================================================================
// Content and Roles
// ============================================================================

/** Role in conversation; the API knows "user", "model" and "function" */
export type Role = 'user' | 'model' | 'function' | (string & {});

/** One turn of a conversation */
export interface Content {
  readonly role?: Role;
  readonly parts: readonly Part[];
}

// ============================================================================
// Constructors
// ============================================================================

export function textPart(text: string): TextPart {
  return { kind: 'text', text };
}

export function inlineDataPart(mimeType: string, data: string): InlineDataPart {
  return { kind: 'inlineData', mimeType, data };
}

export function functionCallPart(name: string, args: JsonObject = {}): FunctionCallPart {
  return { kind: 'functionCall', name, args };
}

export function functionResponsePart(name: string, response: JsonObject): FunctionResponsePart {
  return { kind: 'functionResponse', name, response };
}

export function fileDataPart(fileUri: string, mimeType?: string): FileDataPart {
  return mimeType === undefined ? { kind: 'fileData', fileUri } : { kind: 'fileData', fileUri, mimeType };
}

/**
 * Builds a Content. Strings become text parts.
 */
export function content(role: Role | undefined, ...parts: Array<Part | string>): Content {
  const normalized = parts.map((part) => (typeof part === 'string' ? textPart(part) : part));
  return role === undefined ? { parts: normalized } : { role, parts: normalized };
}

export function userContent(...parts: Array<Part | string>): Content {
  return content('user', ...parts);
}

export function modelContent(...parts: Array<Part | string>): Content {
  return content('model', ...parts);
}

// ============================================================================
// Type Guards
// ============================================================================

export function isTextPart(part: Part): part is TextPart {
  return part.kind === 'text';
}

export function isInlineDataPart(part: Part): part is InlineDataPart {
  return part.kind === 'inlineData';
}

export function isFunctionCallPart(part: Part): part is FunctionCallPart {
  return part.kind === 'functionCall';
}

export function isFunctionResponsePart(part: Part): part is FunctionResponsePart {
  return part.kind === 'functionResponse';
}

export function isFileDataPart(part: Part): part is FileDataPart {
  return part.kind === 'fileData';
}
