/**
 * playfair_decode - Decrypt Playfair ciphertext
 */

import type { DecodeInput, KeySource } from '../types.js';
import { getConfig } from '../config/index.js';
import { resolveCipher } from './cipher.js';

export interface DecodeResult {
  success: boolean;
  output: string;
  keySource: KeySource;
}

/**
 * Decode text
 */
export function decode(input: DecodeInput): DecodeResult {
  const config = getConfig();
  const { cipher, keySource } = resolveCipher(input.key);

  const normalize = input.normalize_case ?? config.normalize_case;
  const stripFiller = input.strip_filler ?? config.strip_filler;

  let output = cipher.decode(normalize ? input.text.toLowerCase() : input.text);
  if (stripFiller) {
    output = output.replace(/x/g, '');
  }

  return {
    success: true,
    output,
    keySource,
  };
}

/**
 * Tool definition for MCP
 */
export const decodeToolDef = {
  name: 'playfair_decode',
  description: 'Decrypt Playfair ciphertext. Filler x letters inserted during encryption remain unless strip_filler is set.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      text: {
        type: 'string',
        description: 'Ciphertext to decrypt.',
      },
      key: {
        type: 'string',
        description: 'Key used to build the 5x5 square. Defaults to the configured default_key.',
      },
      normalize_case: {
        type: 'boolean',
        description: 'Lowercase the text first. Default: from config (false)',
      },
      strip_filler: {
        type: 'boolean',
        description: 'Remove every x from the output. Also removes genuine x letters. Default: from config (false)',
      },
    },
    required: ['text'],
  },
};
