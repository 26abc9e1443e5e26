/**
 * SHA-256 Hash Utilities for canonical text integrity
 *
 * All hashes use the format: 'sha256:' + 64-character lowercase hex string.
 *
 * @module utils/hash
 */

import crypto from 'crypto';

/**
 * Hash prefix used for all SHA-256 hashes in this system
 */
const HASH_PREFIX = 'sha256:';

/**
 * Matches 'sha256:' followed by exactly 64 lowercase hex characters
 */
const HASH_PATTERN = /^sha256:[a-f0-9]{64}$/;

/**
 * Compute SHA-256 hash of content
 *
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer): string {
  return HASH_PREFIX + crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Check that a string is a well-formed hash
 */
export function isValidHashFormat(hash: string): boolean {
  return HASH_PATTERN.test(hash);
}

/**
 * Verify content against an expected hash
 */
export function verifyHash(content: string | Buffer, expectedHash: string): boolean {
  if (!isValidHashFormat(expectedHash)) {
    return false;
  }
  return computeHash(content) === expectedHash;
}
