/**
 * Hashing, token generation and constant-time comparison
 *
 * All digests are SHA-256, hex-encoded. Tokens are 256-bit CSPRNG draws.
 */

import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, randomBytes } from '@noble/hashes/utils';

// =============================================================================
// Constants
// =============================================================================

/** Bytes of entropy in identity, ballot and receipt tokens */
export const TOKEN_BYTES = 32;

const TOKEN_PATTERN = /^[0-9a-f]{64}$/;

// =============================================================================
// Hash Functions
// =============================================================================

/**
 * Compute SHA-256 hash of data
 *
 * @returns Hex-encoded hash
 */
export function hash(data: string | Uint8Array): string {
  const bytes = typeof data === 'string'
    ? new TextEncoder().encode(data)
    : data;
  return bytesToHex(sha256(bytes));
}

/**
 * Hash several values joined with `|`
 */
export function hashValues(...values: string[]): string {
  return hash(values.join('|'));
}

/**
 * Salted hash for low-entropy secrets such as a date of birth
 */
export function hashSecret(secret: string, salt: string): string {
  return hashValues('secret', salt, secret.trim().toLowerCase());
}

// =============================================================================
// Tokens
// =============================================================================

/**
 * Draw a fresh random token
 *
 * The value depends on nothing but the CSPRNG. Callers must never mix voter
 * attributes into it.
 */
export function generateToken(bytes: number = TOKEN_BYTES): string {
  return bytesToHex(randomBytes(bytes));
}

/**
 * Check that a presented token has the shape `generateToken` produces
 */
export function isWellFormedToken(token: string): boolean {
  return TOKEN_PATTERN.test(token);
}

/**
 * Digest under which a token is stored; the raw token is never persisted
 */
export function tokenDigest(token: string): string {
  return hash(token);
}

// =============================================================================
// Secure Comparison
// =============================================================================

/**
 * Constant-time comparison of two strings
 *
 * Runs over the full length regardless of where the first difference is.
 */
export function secureCompare(a: string, b: string): boolean {
  const aBytes = new TextEncoder().encode(a);
  const bBytes = new TextEncoder().encode(b);

  if (aBytes.length !== bBytes.length) {
    return false;
  }

  let result = 0;
  for (let i = 0; i < aBytes.length; i++) {
    result |= (aBytes[i] ?? 0) ^ (bBytes[i] ?? 0);
  }

  return result === 0;
}

export {
  generateElectionKeyPair,
  sealChoice,
  openChoice,
  isSealedChoice,
  isElectionPublicKey,
  type ElectionKeyPair,
} from './ballot-cipher.js';
