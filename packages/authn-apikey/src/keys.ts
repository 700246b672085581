/**
 * API Key Generation and Hashing
 *
 * Key format: tg_sk_{48_base64url}
 * Entropy: 288 bits (36 bytes → 48 base64url chars)
 * Hash: SHA-256 hex. Keys are high-entropy random strings, so a fast
 * deterministic digest is enough and lets the resolver find a key by its
 * hash in one indexed lookup.
 */

import { createHash, randomBytes } from 'crypto';

export const API_KEY_PREFIX = 'tg_sk_';

const API_KEY_PATTERN = /^tg_sk_[A-Za-z0-9_-]{48}$/;

/**
 * Generate a new plaintext API key
 */
export function generateApiKey(): string {
  // 36 random bytes → 48 base64url characters, no padding
  return `${API_KEY_PREFIX}${randomBytes(36).toString('base64url')}`;
}

/**
 * SHA-256 hex digest of a plaintext key (the only form that is stored)
 */
export function hashApiKey(apiKey: string): string {
  return createHash('sha256').update(apiKey, 'utf8').digest('hex');
}

/**
 * True when the token has the API-key shape. Checked before any lookup.
 */
export function isValidApiKeyFormat(apiKey: string): boolean {
  return API_KEY_PATTERN.test(apiKey);
}
