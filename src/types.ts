import { z } from 'zod';

// Configuration
export interface PlayfairConfig {
  default_key?: string;
  normalize_case: boolean;  // Lowercase text before the engine sees it
  strip_filler: boolean;    // Drop every 'x' from decoded output
}

export const DEFAULT_CONFIG: PlayfairConfig = {
  normalize_case: false,
  strip_filler: false,
};

// Shape accepted from config.json; unknown fields are dropped
export const ConfigFileSchema = z.object({
  default_key: z.string().optional(),
  normalize_case: z.boolean().optional(),
  strip_filler: z.boolean().optional(),
});

// MCP tool inputs
export const EncodeInputSchema = z.object({
  text: z.string(),
  key: z.string().optional(),
  normalize_case: z.boolean().optional(),
});
export type EncodeInput = z.infer<typeof EncodeInputSchema>;

export const DecodeInputSchema = EncodeInputSchema.extend({
  strip_filler: z.boolean().optional(),
});
export type DecodeInput = z.infer<typeof DecodeInputSchema>;

export const SquareInputSchema = z.object({
  key: z.string().optional(),
});
export type SquareInput = z.infer<typeof SquareInputSchema>;

export const ConfigInputSchema = z.object({
  default_key: z.string().optional(),
  normalize_case: z.boolean().optional(),
  strip_filler: z.boolean().optional(),
  show: z.boolean().optional(),
});
export type ConfigInput = z.infer<typeof ConfigInputSchema>;

export type KeySource = 'argument' | 'config';
