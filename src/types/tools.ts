/**
 * Tool-related types.
 */

import type { JsonObject } from './content.js';

/** Function the model may call */
export interface FunctionDeclaration {
  readonly name: string;
  readonly description: string;
  /** OpenAPI-style schema, sent as-is */
  readonly parameters?: JsonObject;
}

/** Tool definition */
export interface Tool {
  readonly functionDeclarations?: readonly FunctionDeclaration[];
}

export const FUNCTION_CALLING_MODES = ['AUTO', 'ANY', 'NONE'] as const;

/** Function calling mode */
export type FunctionCallingMode = (typeof FUNCTION_CALLING_MODES)[number];

/** Function calling configuration */
export interface FunctionCallingConfig {
  readonly mode: FunctionCallingMode;
  /** Only with mode ANY */
  readonly allowedFunctionNames?: readonly string[];
}

/** Tool configuration */
export interface ToolConfig {
  readonly functionCallingConfig?: FunctionCallingConfig;
}
