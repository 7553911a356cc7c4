/**
 * playfair_encode - Encrypt text with a Playfair key
 */

import type { EncodeInput, KeySource } from '../types.js';
import { getConfig } from '../config/index.js';
import { resolveCipher } from './cipher.js';

export interface EncodeResult {
  success: boolean;
  output: string;
  keySource: KeySource;
}

/**
 * Encode text
 */
export function encode(input: EncodeInput): EncodeResult {
  const config = getConfig();
  const { cipher, keySource } = resolveCipher(input.key);

  const normalize = input.normalize_case ?? config.normalize_case;
  const text = normalize ? input.text.toLowerCase() : input.text;

  return {
    success: true,
    output: cipher.encode(text),
    keySource,
  };
}

/**
 * Tool definition for MCP
 */
export const encodeToolDef = {
  name: 'playfair_encode',
  description: 'Encrypt text with the Playfair cipher. Only lowercase a-z are enciphered; everything else passes through unchanged.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      text: {
        type: 'string',
        description: 'Plaintext to encrypt.',
      },
      key: {
        type: 'string',
        description: 'Key used to build the 5x5 square. Defaults to the configured default_key.',
      },
      normalize_case: {
        type: 'boolean',
        description: 'Lowercase the text first so uppercase letters are enciphered too. Default: from config (false)',
      },
    },
    required: ['text'],
  },
};
