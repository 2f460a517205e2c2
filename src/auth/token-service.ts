/**
 * Token lifecycle: issue, revoke, rotate.
 *
 * The raw token string exists only in the return value of `createToken` and
 * `regenerateToken`. The store keeps its lookup prefix and a PBKDF2 hash.
 */

import { v4 as uuid } from 'uuid';
import { createTypedError, notFoundError, TypedError, validationError } from '../domain/errors';
import { AuthToken } from '../domain/token';
import { createLogger } from '../logger';
import { Store } from '../storage/store';
import { generateToken, isValidAlias, parseToken, TOKEN_ALIAS_MAX_LENGTH } from './token-format';
import { DEFAULT_PBKDF2_ITERATIONS, hashToken } from './token-hash';

const log = createLogger({ module: 'token-service' });

/** Attempts at drawing a secret whose prefix is not already taken. */
const MAX_PREFIX_ATTEMPTS = 5;

const REGENERATED_REASON = 'regenerated';

export interface IssuedToken {
  token: AuthToken;
  /** Shown once; never stored. */
  rawToken: string;
}

export type TokenServiceResult =
  | { success: true; issued: IssuedToken }
  | { success: false; error: TypedError };

export interface CreateTokenInput {
  realmId: string;
  alias: string;
  expiresAt?: string;
}

export interface TokenServiceOptions {
  hashIterations?: number;
}

export class TokenService {
  private readonly hashIterations: number;

  constructor(
    private readonly store: Store,
    options: TokenServiceOptions = {},
  ) {
    this.hashIterations = options.hashIterations ?? DEFAULT_PBKDF2_ITERATIONS;
  }

  async createToken(input: CreateTokenInput): Promise<TokenServiceResult> {
    if (!isValidAlias(input.alias)) {
      return {
        success: false,
        error: validationError(
          `Token alias must be 1-${TOKEN_ALIAS_MAX_LENGTH} letters, digits or hyphens`,
          { alias: input.alias },
        ),
      };
    }
    if (input.expiresAt !== undefined && Number.isNaN(Date.parse(input.expiresAt))) {
      return { success: false, error: validationError('expiresAt must be an ISO timestamp') };
    }

    const realm = await this.store.realms.getById(input.realmId);
    if (!realm) {
      return { success: false, error: notFoundError('Realm', input.realmId) };
    }

    const siblings = await this.store.tokens.listByRealm(realm.id);
    if (siblings.some((t) => t.isActive && t.alias === input.alias)) {
      return {
        success: false,
        error: createTypedError({
          code: 'VALIDATION.CONFLICT',
          message: `Token alias already used in this realm: ${input.alias}`,
        }),
      };
    }

    const secret = await this.drawUnusedSecret(input.alias);
    const token: AuthToken = {
      id: `tok_${uuid()}`,
      realmId: realm.id,
      alias: input.alias,
      tokenPrefix: secret.prefix,
      secretHash: hashToken(secret.raw, this.hashIterations),
      expiresAt: input.expiresAt,
      isActive: true,
      useCount: 0,
      createdAt: new Date().toISOString(),
    };
    const stored = await this.store.tokens.create(token);
    log.info('Token created', { tokenId: stored.id, realmId: realm.id, prefix: stored.tokenPrefix });
    return { success: true, issued: { token: stored, rawToken: secret.raw } };
  }

  /** Deactivate a token. Revoking twice keeps the first reason. */
  async revokeToken(tokenId: string, reason: string): Promise<AuthToken | null> {
    const existing = await this.store.tokens.getById(tokenId);
    if (!existing) return null;
    if (!existing.isActive) return existing;
    const updated = await this.store.tokens.update(tokenId, {
      isActive: false,
      revokedAt: new Date().toISOString(),
      revokedReason: reason,
    });
    log.info('Token revoked', { tokenId, reason });
    return updated;
  }

  /**
   * Rotate an active token: the old row is revoked with reason `regenerated`
   * and a new token is issued with the same alias, realm and expiry. A
   * revoked token stays revoked.
   */
  async regenerateToken(tokenId: string): Promise<TokenServiceResult> {
    const existing = await this.store.tokens.getById(tokenId);
    if (!existing) {
      return { success: false, error: notFoundError('Token', tokenId) };
    }
    if (!existing.isActive) {
      return {
        success: false,
        error: createTypedError({
          code: 'VALIDATION.CONFLICT',
          message: `Token is revoked and cannot be regenerated: ${tokenId}`,
        }),
      };
    }

    await this.revokeToken(existing.id, REGENERATED_REASON);
    const secret = await this.drawUnusedSecret(existing.alias);
    const token: AuthToken = {
      id: `tok_${uuid()}`,
      realmId: existing.realmId,
      alias: existing.alias,
      tokenPrefix: secret.prefix,
      secretHash: hashToken(secret.raw, this.hashIterations),
      expiresAt: existing.expiresAt,
      isActive: true,
      useCount: 0,
      createdAt: new Date().toISOString(),
    };
    const stored = await this.store.tokens.create(token);
    log.info('Token regenerated', { previousTokenId: existing.id, tokenId: stored.id, prefix: stored.tokenPrefix });
    return { success: true, issued: { token: stored, rawToken: secret.raw } };
  }

  private async drawUnusedSecret(alias: string): Promise<{ raw: string; prefix: string }> {
    for (let attempt = 0; attempt < MAX_PREFIX_ATTEMPTS; attempt++) {
      const raw = generateToken(alias);
      const parsed = parseToken(raw);
      if (!parsed) break;
      if (!(await this.store.tokens.getByPrefix(parsed.prefix))) {
        return { raw, prefix: parsed.prefix };
      }
    }
    throw new Error('Could not generate a token with an unused prefix');
  }
}
