/**
 * MCP Tools Module
 */

export { encode, encodeToolDef, type EncodeResult } from './encode.js';
export { decode, decodeToolDef, type DecodeResult } from './decode.js';
export { square, squareToolDef, type SquareResult } from './square.js';
export { config, configToolDef, type ConfigResult } from './config.js';
export {
  resolveCipher,
  clearCipherCache,
  cipherCacheSize,
  CIPHER_CACHE_LIMIT,
  type ResolvedCipher,
} from './cipher.js';
export { callTool, toolDefs, type ToolResponse } from './dispatch.js';
