/**
 * API token domain model.
 *
 * A bearer credential bound to exactly one realm. The raw token is handed to
 * the owner once at creation; only its prefix and a one-way hash are kept.
 */

export interface AuthToken {
  id: string;
  realmId: string;
  /** Human label, unique within the realm. */
  alias: string;
  /** Globally unique, indexable, not secret. */
  tokenPrefix: string;
  /** PBKDF2 hash of the full token string. */
  secretHash: string;
  /** ISO timestamp; undefined means the token never expires. */
  expiresAt?: string;
  isActive: boolean;
  lastUsedAt?: string;
  lastUsedIp?: string;
  useCount: number;
  createdAt: string;
  revokedAt?: string;
  revokedReason?: string;
}

/** A token is expired once its expiry instant has been reached. */
export function isTokenExpired(token: AuthToken, now: Date = new Date()): boolean {
  if (!token.expiresAt) return false;
  const expiry = Date.parse(token.expiresAt);
  // An unparseable expiry counts as expired.
  return Number.isNaN(expiry) || expiry <= now.getTime();
}
