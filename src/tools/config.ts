/**
 * playfair_config - Configure defaults for the Playfair tools
 */

import type { ConfigInput, PlayfairConfig } from '../types.js';
import {
  getConfigForDisplay,
  updateConfig,
  validateConfig,
} from '../config/index.js';

export interface ConfigResult {
  success: boolean;
  config?: Record<string, unknown>;
  message: string;
  warnings?: string[];
}

/**
 * Configure tool defaults
 */
export function config(input: ConfigInput): ConfigResult {
  // Show current config
  if (input.show) {
    const validation = validateConfig();

    return {
      success: true,
      config: getConfigForDisplay(),
      message: 'Current configuration:',
      warnings: validation.issues.length > 0 ? validation.issues : undefined,
    };
  }

  const updates: Partial<PlayfairConfig> = {};
  if (input.default_key !== undefined) {
    updates.default_key = input.default_key;
  }
  if (input.normalize_case !== undefined) {
    updates.normalize_case = input.normalize_case;
  }
  if (input.strip_filler !== undefined) {
    updates.strip_filler = input.strip_filler;
  }

  if (Object.keys(updates).length > 0) {
    updateConfig(updates);
    const validation = validateConfig();

    return {
      success: true,
      config: getConfigForDisplay(),
      message: `Updated ${Object.keys(updates).join(', ')}.`,
      warnings: validation.issues.length > 0 ? validation.issues : undefined,
    };
  }

  // No action specified - show help
  return {
    success: true,
    config: getConfigForDisplay(),
    message: `Playfair tool configuration. Use parameters to update settings:
- default_key: Key used when a tool call passes none
- normalize_case: Lowercase input text before enciphering (true/false)
- strip_filler: Remove x letters from decoded output (true/false)
- show: Display current configuration`,
  };
}

/**
 * Tool definition for MCP
 */
export const configToolDef = {
  name: 'playfair_config',
  description: 'Configure the default key and text handling options used by the Playfair tools.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      default_key: {
        type: 'string',
        description: 'Key used when a tool call does not pass one.',
      },
      normalize_case: {
        type: 'boolean',
        description: 'Lowercase input text before enciphering or deciphering.',
      },
      strip_filler: {
        type: 'boolean',
        description: 'Remove x letters from decoded output.',
      },
      show: {
        type: 'boolean',
        description: 'Display current configuration settings.',
      },
    },
  },
};
