/**
 * playfair_square - Show the key square for a key
 */

import type { KeySource, SquareInput } from '../types.js';
import { resolveCipher } from './cipher.js';

export interface SquareResult {
  success: boolean;
  rows: string[];
  keySource: KeySource;
}

export function square(input: SquareInput): SquareResult {
  const { cipher, keySource } = resolveCipher(input.key);

  return {
    success: true,
    rows: cipher.square.rows(),
    keySource,
  };
}

/**
 * Tool definition for MCP
 */
export const squareToolDef = {
  name: 'playfair_square',
  description: 'Return the five rows of the 5x5 key square built from a key (i and j share a cell).',
  inputSchema: {
    type: 'object' as const,
    properties: {
      key: {
        type: 'string',
        description: 'Key to build the square from. Defaults to the configured default_key.',
      },
    },
  },
};
