/** Library version, sent in the client identification header */
export const VERSION = '0.1.0';

/** Library name, sent in the client identification header */
export const LIBRARY_NAME = 'genai-ts';
