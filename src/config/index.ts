/**
 * Configuration Management
 *
 * Default key and text options, persisted as JSON in
 * ~/.playfair/config.json (or $PLAYFAIR_HOME/config.json).
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import type { PlayfairConfig } from '../types.js';
import { ConfigFileSchema, DEFAULT_CONFIG } from '../types.js';

// In-memory config cache
let currentConfig: PlayfairConfig | null = null;

/**
 * Directory holding config.json
 */
export function getConfigDir(): string {
  return process.env.PLAYFAIR_HOME || join(homedir(), '.playfair');
}

export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Load configuration from disk or environment
 */
export function loadConfig(): PlayfairConfig {
  if (currentConfig) {
    return currentConfig;
  }

  let config: PlayfairConfig = { ...DEFAULT_CONFIG };
  const configPath = getConfigPath();

  // Try to load from file
  if (existsSync(configPath)) {
    try {
      const fileContent = readFileSync(configPath, 'utf-8');
      const parsed = ConfigFileSchema.safeParse(JSON.parse(fileContent));
      if (parsed.success) {
        config = { ...config, ...parsed.data };
      } else {
        console.error('Invalid config file, using defaults:', parsed.error.message);
      }
    } catch (error) {
      console.error('Failed to load config file:', error);
    }
  }

  // Override with environment variables
  if (process.env.PLAYFAIR_KEY) {
    config.default_key = process.env.PLAYFAIR_KEY;
  }

  currentConfig = config;
  return config;
}

/**
 * Save configuration to disk
 */
export function saveConfig(config: PlayfairConfig): void {
  ensureConfigDir();

  // A key taken from the environment stays in the environment
  const configToSave = { ...config };
  if (process.env.PLAYFAIR_KEY && config.default_key === process.env.PLAYFAIR_KEY) {
    delete configToSave.default_key;
  }

  writeFileSync(getConfigPath(), JSON.stringify(configToSave, null, 2), 'utf-8');
  currentConfig = config;
}

/**
 * Update specific config values
 */
export function updateConfig(updates: Partial<PlayfairConfig>): PlayfairConfig {
  const config = loadConfig();
  const newConfig = { ...config, ...updates };
  saveConfig(newConfig);
  return newConfig;
}

/**
 * Get current config (cached)
 */
export function getConfig(): PlayfairConfig {
  return loadConfig();
}

/**
 * Forget the cached config so the next load reads disk and env again
 */
export function resetConfigCache(): void {
  currentConfig = null;
}

/**
 * Get config for display (with the key redacted)
 */
export function getConfigForDisplay(): Record<string, unknown> {
  const config = loadConfig();
  return {
    default_key: config.default_key
      ? `...${config.default_key.slice(-2)}`
      : '(not set)',
    normalize_case: config.normalize_case,
    strip_filler: config.strip_filler,
    config_path: getConfigPath(),
  };
}

/**
 * Validate config and return any issues
 */
export function validateConfig(): { valid: boolean; issues: string[] } {
  const config = loadConfig();
  const issues: string[] = [];

  if (!config.default_key) {
    issues.push('No default key configured. Every call must pass a key.');
  } else if (!/[a-z]/.test(config.default_key)) {
    issues.push('Default key has no lowercase letters; the square will be the plain alphabet.');
  }

  return {
    valid: issues.length === 0,
    issues,
  };
}
