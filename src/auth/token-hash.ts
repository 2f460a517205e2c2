/**
 * One-way hashing for token secrets.
 *
 * PBKDF2 with a per-token random salt. The stored form is
 * `<iterations>:<salt>:<derivedKey>` so the work factor can be raised
 * without invalidating existing tokens.
 */

import { pbkdf2Sync, randomBytes, timingSafeEqual } from 'crypto';

export const DEFAULT_PBKDF2_ITERATIONS = 100_000;
const PBKDF2_KEYLEN = 64;
const PBKDF2_DIGEST = 'sha512';
const SALT_BYTES = 32;

/** Hash a full token string for storage. */
export function hashToken(token: string, iterations: number = DEFAULT_PBKDF2_ITERATIONS): string {
  const salt = randomBytes(SALT_BYTES).toString('hex');
  const derived = pbkdf2Sync(token, salt, iterations, PBKDF2_KEYLEN, PBKDF2_DIGEST).toString('hex');
  return `${iterations}:${salt}:${derived}`;
}

/**
 * Verify a token against a stored hash.
 * Uses constant-time comparison to prevent timing attacks.
 */
export function verifyTokenHash(token: string, storedHash: string): boolean {
  const [iterationsText, salt, expectedKey] = storedHash.split(':');
  const iterations = Number(iterationsText);
  if (!Number.isInteger(iterations) || iterations <= 0 || !salt || !expectedKey) return false;
  const derived = pbkdf2Sync(token, salt, iterations, PBKDF2_KEYLEN, PBKDF2_DIGEST);
  const expected = Buffer.from(expectedKey, 'hex');
  if (derived.length !== expected.length) return false;
  return timingSafeEqual(derived, expected);
}
