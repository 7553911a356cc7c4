/**
 * Routes MCP tool calls to their handlers
 */

import {
  ConfigInputSchema,
  DecodeInputSchema,
  EncodeInputSchema,
  SquareInputSchema,
} from '../types.js';
import { encode, encodeToolDef } from './encode.js';
import { decode, decodeToolDef } from './decode.js';
import { square, squareToolDef } from './square.js';
import { config, configToolDef } from './config.js';

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export const toolDefs = [
  encodeToolDef,
  decodeToolDef,
  squareToolDef,
  configToolDef,
];

function textResponse(result: unknown): ToolResponse {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(result, null, 2),
      },
    ],
  };
}

function errorResponse(text: string): ToolResponse {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
    isError: true,
  };
}

/**
 * Validate arguments and run the named tool
 */
export function callTool(name: string, args: unknown): ToolResponse {
  try {
    switch (name) {
      case 'playfair_encode':
        return textResponse(encode(EncodeInputSchema.parse(args)));

      case 'playfair_decode':
        return textResponse(decode(DecodeInputSchema.parse(args)));

      case 'playfair_square':
        return textResponse(square(SquareInputSchema.parse(args ?? {})));

      case 'playfair_config':
        return textResponse(config(ConfigInputSchema.parse(args ?? {})));

      default:
        return errorResponse(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return errorResponse(`Error: ${errorMessage}`);
  }
}
