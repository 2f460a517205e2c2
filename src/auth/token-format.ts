/**
 * Bearer token format.
 *
 * Tokens look like `rdg_<alias>_<secret>`:
 *   - `rdg` is the fixed scheme marker,
 *   - `alias` is a short label of letters, digits and hyphens,
 *   - `secret` is random; its first TOKEN_LOOKUP_PREFIX_LENGTH characters
 *     form the globally unique lookup prefix.
 *
 * The whole string must be TOKEN_MIN_LENGTH..TOKEN_MAX_LENGTH characters of
 * `[A-Za-z0-9_-]`. The lower bound admits short fixture tokens such as
 * `rdg_dev_abcdefgh1234` (20 characters).
 */

import { createHash, randomInt } from 'crypto';

export const TOKEN_SCHEME = 'rdg';
export const TOKEN_MIN_LENGTH = 20;
export const TOKEN_MAX_LENGTH = 128;
export const TOKEN_LOOKUP_PREFIX_LENGTH = 8;
export const TOKEN_ALIAS_MAX_LENGTH = 32;
/** Length of secrets produced by {@link generateToken}. */
export const GENERATED_SECRET_LENGTH = 48;

const TOKEN_CHARSET = /^[A-Za-z0-9_-]+$/;
const ALIAS_PATTERN = new RegExp(`^[A-Za-z0-9-]{1,${TOKEN_ALIAS_MAX_LENGTH}}$`);
const SECRET_PATTERN = new RegExp(`^[A-Za-z0-9-]{${TOKEN_LOOKUP_PREFIX_LENGTH},}$`);
const SECRET_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export interface ParsedToken {
  alias: string;
  secret: string;
  /** Lookup key: the head of the secret. */
  prefix: string;
}

/**
 * Parse a presented token. Returns null when the string is outside the
 * length bound, uses characters outside the charset, or does not have the
 * three-part shape. No store access happens for a null result.
 */
export function parseToken(token: string): ParsedToken | null {
  if (token.length < TOKEN_MIN_LENGTH || token.length > TOKEN_MAX_LENGTH) return null;
  if (!TOKEN_CHARSET.test(token)) return null;

  const parts = token.split('_');
  if (parts.length !== 3) return null;
  const [scheme, alias, secret] = parts;
  if (scheme !== TOKEN_SCHEME) return null;
  if (!ALIAS_PATTERN.test(alias) || !SECRET_PATTERN.test(secret)) return null;

  return { alias, secret, prefix: secret.slice(0, TOKEN_LOOKUP_PREFIX_LENGTH) };
}

/** Generate a new random token for the given alias. */
export function generateToken(alias: string): string {
  let secret = '';
  for (let i = 0; i < GENERATED_SECRET_LENGTH; i++) {
    secret += SECRET_ALPHABET[randomInt(SECRET_ALPHABET.length)];
  }
  return `${TOKEN_SCHEME}_${alias}_${secret}`;
}

export function isValidAlias(alias: string): boolean {
  return ALIAS_PATTERN.test(alias);
}

/**
 * Short, non-reversible identifier of a presented string, safe for logs and
 * audit records. Works on malformed input too.
 */
export function tokenFingerprint(token: string): string {
  return createHash('sha256').update(token, 'utf8').digest('hex').slice(0, 12);
}

/**
 * Extract the token from an `Authorization: Bearer <token>` header value.
 * Returns undefined when the header is missing or uses another scheme.
 */
export function extractBearerToken(header: string | undefined): string | undefined {
  if (!header) return undefined;
  const space = header.indexOf(' ');
  if (space === -1) return undefined;
  const scheme = header.slice(0, space);
  if (scheme.toLowerCase() !== 'bearer') return undefined;
  const token = header.slice(space + 1).trim();
  return token.length > 0 ? token : undefined;
}
