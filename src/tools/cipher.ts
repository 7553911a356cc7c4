/**
 * Resolves the key for a tool call and caches engines for recent keys
 */

import { PlayfairCipher } from '../cipher/index.js';
import { getConfig } from '../config/index.js';
import type { KeySource } from '../types.js';

// Most recently used keys; Map keeps insertion order, oldest first
export const CIPHER_CACHE_LIMIT = 32;

const ciphers = new Map<string, PlayfairCipher>();

export interface ResolvedCipher {
  cipher: PlayfairCipher;
  keySource: KeySource;
}

function cachedCipher(key: string): PlayfairCipher {
  const cached = ciphers.get(key);
  if (cached) {
    ciphers.delete(key);
    ciphers.set(key, cached);
    return cached;
  }

  const cipher = new PlayfairCipher(key);
  ciphers.set(key, cipher);

  while (ciphers.size > CIPHER_CACHE_LIMIT) {
    const oldest = ciphers.keys().next();
    if (oldest.done) {
      break;
    }
    ciphers.delete(oldest.value);
  }

  return cipher;
}

/**
 * Use the key passed to the tool, falling back to the configured default.
 * An empty key counts as no key.
 */
export function resolveCipher(key?: string): ResolvedCipher {
  if (key) {
    return { cipher: cachedCipher(key), keySource: 'argument' };
  }

  const defaultKey = getConfig().default_key;
  if (!defaultKey) {
    throw new Error('No key provided and no default_key configured. Pass a key or set one with playfair_config.');
  }

  return { cipher: cachedCipher(defaultKey), keySource: 'config' };
}

export function cipherCacheSize(): number {
  return ciphers.size;
}

export function clearCipherCache(): void {
  ciphers.clear();
}
