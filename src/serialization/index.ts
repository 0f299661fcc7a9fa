/**
 * Wire format encoding and decoding.
 */

export { snakeCase, toWireKey, fromWireKey, isFieldName, type FieldName } from './wire-keys.js';
export {
  writeFields,
  encodePart,
  encodeContent,
  encodeGenerationConfig,
  encodeSafetySetting,
  encodeTool,
  encodeToolConfig,
  encodeGenerateContentRequest,
  encodeCountTokensRequest,
  serializeRequest,
  type WireObject,
} from './encoder.js';
export {
  parseJson,
  decodePart,
  decodeContent,
  decodeGenerationConfig,
  decodeSafetySetting,
  decodeToolConfig,
  decodeGenerateContentResponse,
  decodeCountTokensResponse,
} from './decoder.js';
