/**
 * Streaming response decoding.
 */

export { ChunkedJsonParser } from './chunked-json.js';
export { decodeJsonArrayStream, type StreamDecodeOptions } from './stream-decoder.js';
