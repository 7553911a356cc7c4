/**
 * Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  loadConfig,
  updateConfig,
  resetConfigCache,
  getConfigForDisplay,
  getConfigPath,
  validateConfig,
} from '../src/config/index.js';

describe('Config', () => {
  let home: string;

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), 'playfair-config-'));
    vi.stubEnv('PLAYFAIR_HOME', home);
    vi.stubEnv('PLAYFAIR_KEY', '');
    resetConfigCache();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    resetConfigCache();
    rmSync(home, { recursive: true, force: true });
  });

  it('should fall back to defaults without a config file', () => {
    expect(loadConfig()).toEqual({ normalize_case: false, strip_filler: false });
    expect(getConfigPath()).toBe(join(home, 'config.json'));
  });

  it('should persist updates and read them back', () => {
    updateConfig({ default_key: 'test-secret', strip_filler: true });
    resetConfigCache();

    expect(loadConfig()).toEqual({
      default_key: 'test-secret',
      normalize_case: false,
      strip_filler: true,
    });
  });

  it('should let PLAYFAIR_KEY override the file without persisting it', () => {
    writeFileSync(join(home, 'config.json'), JSON.stringify({ default_key: 'from file' }));
    vi.stubEnv('PLAYFAIR_KEY', 'from env');

    expect(loadConfig().default_key).toBe('from env');

    updateConfig({ normalize_case: true });
    const saved = JSON.parse(readFileSync(join(home, 'config.json'), 'utf-8'));
    expect(saved).toEqual({ normalize_case: true, strip_filler: false });
  });

  it('should use defaults when the file is not valid json', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    writeFileSync(join(home, 'config.json'), '{ not json');

    expect(loadConfig()).toEqual({ normalize_case: false, strip_filler: false });
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('should use defaults when the file has the wrong shape', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    writeFileSync(join(home, 'config.json'), JSON.stringify({ strip_filler: 'yes' }));

    expect(loadConfig()).toEqual({ normalize_case: false, strip_filler: false });
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('should create the config directory on save', () => {
    const nested = join(home, 'nested');
    vi.stubEnv('PLAYFAIR_HOME', nested);

    updateConfig({ normalize_case: true });
    expect(existsSync(join(nested, 'config.json'))).toBe(true);
  });

  it('should redact the key for display', () => {
    updateConfig({ default_key: 'gravity falls' });

    expect(getConfigForDisplay()).toEqual({
      default_key: '...ls',
      normalize_case: false,
      strip_filler: false,
      config_path: join(home, 'config.json'),
    });
  });

  describe('validateConfig', () => {
    it('should flag a missing key', () => {
      expect(validateConfig()).toEqual({
        valid: false,
        issues: ['No default key configured. Every call must pass a key.'],
      });
    });

    it('should flag a key without lowercase letters', () => {
      updateConfig({ default_key: 'SECRET' });
      expect(validateConfig().issues).toEqual([
        'Default key has no lowercase letters; the square will be the plain alphabet.',
      ]);
    });

    it('should accept a usable key', () => {
      updateConfig({ default_key: 'playfair example' });
      expect(validateConfig()).toEqual({ valid: true, issues: [] });
    });
  });
});
