/**
 * Request and response types.
 */

export * from './content.js';
export * from './safety.js';
export * from './generation.js';
export * from './tools.js';
export * from './common.js';
