/**
 * Bearer token authentication.
 *
 * One call classifies one presented token. The steps, in order:
 *   1. Shape check (length, charset, `rdg_<alias>_<secret>`); no store access
 *      for a malformed token.
 *   2. One `getByPrefix` lookup.
 *   3. Constant-time verification of the full token against the stored hash.
 *   4. Lifecycle: token active and unexpired, realm approved, account usable.
 *
 * Callers only ever see the coarse {@link AuthFailureReason}; the finer
 * `errorCode` is for the activity log.
 */

import { Account, isAccountUsable } from '../domain/account';
import { ActivityErrorCode } from '../domain/activity';
import { AuthFailureReason } from '../domain/decision';
import { Realm, RealmStatus } from '../domain/realm';
import { AuthToken, isTokenExpired } from '../domain/token';
import { createLogger } from '../logger';
import { Store } from '../storage/store';
import { parseToken, tokenFingerprint } from './token-format';
import { DEFAULT_PBKDF2_ITERATIONS, hashToken, verifyTokenHash } from './token-hash';

const log = createLogger({ module: 'token-authenticator' });

export interface AuthSuccess {
  authenticated: true;
  token: AuthToken;
  realm: Realm;
  account: Account;
  fingerprint: string;
}

export interface AuthFailure {
  authenticated: false;
  reason: AuthFailureReason;
  errorCode: ActivityErrorCode;
  /** Absent when no token was presented. */
  fingerprint?: string;
  /** Set once the prefix resolved, for the activity log only. */
  tokenId?: string;
  realmId?: string;
  accountId?: string;
}

export type AuthResult = AuthSuccess | AuthFailure;

export interface TokenAuthenticatorOptions {
  /** Clock used for expiry checks. */
  now?: () => Date;
  /**
   * Work factor of the decoy hash verified when a prefix is unknown, so a
   * miss costs about as much as a wrong secret. Match the token hashing cost.
   */
  decoyHashIterations?: number;
}

export class TokenAuthenticator {
  private readonly now: () => Date;
  private readonly decoyIterations: number;
  private decoyHash?: string;

  constructor(
    private readonly store: Store,
    options: TokenAuthenticatorOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.decoyIterations = options.decoyHashIterations ?? DEFAULT_PBKDF2_ITERATIONS;
  }

  /**
   * Authenticate a presented token. `sourceIp` is recorded as the token's
   * last-used address on success.
   */
  async authenticate(presented: string | undefined, sourceIp: string): Promise<AuthResult> {
    const result = await this.classify(presented);

    log.info('Token authentication', {
      authenticated: result.authenticated,
      classification: result.authenticated ? 'ok' : result.errorCode,
      fingerprint: result.fingerprint,
      sourceIp,
    });

    if (result.authenticated) {
      await this.touch(result.token, sourceIp);
    }
    return result;
  }

  private async classify(presented: string | undefined): Promise<AuthResult> {
    if (presented === undefined || presented.length === 0) {
      return { authenticated: false, reason: 'missing', errorCode: 'missing_token' };
    }

    const fingerprint = tokenFingerprint(presented);
    const parsed = parseToken(presented);
    if (!parsed) {
      return { authenticated: false, reason: 'malformed', errorCode: 'token_malformed', fingerprint };
    }

    const token = await this.store.tokens.getByPrefix(parsed.prefix);
    if (!token) {
      verifyTokenHash(presented, this.getDecoyHash());
      return { authenticated: false, reason: 'not_found', errorCode: 'token_not_found', fingerprint };
    }

    const refs = { fingerprint, tokenId: token.id, realmId: token.realmId };
    if (!verifyTokenHash(presented, token.secretHash)) {
      return { authenticated: false, reason: 'invalid_credential', errorCode: 'token_hash_mismatch', ...refs };
    }

    if (!token.isActive) {
      return { authenticated: false, reason: 'expired_or_disabled', errorCode: 'token_revoked', ...refs };
    }
    if (isTokenExpired(token, this.now())) {
      return { authenticated: false, reason: 'expired_or_disabled', errorCode: 'token_expired', ...refs };
    }

    const realm = await this.store.realms.getById(token.realmId);
    if (!realm || realm.status !== RealmStatus.Approved) {
      return {
        authenticated: false,
        reason: 'expired_or_disabled',
        errorCode: 'realm_not_approved',
        ...refs,
        accountId: realm?.accountId,
      };
    }

    const account = await this.store.accounts.getById(realm.accountId);
    if (!account || !isAccountUsable(account)) {
      return {
        authenticated: false,
        reason: 'expired_or_disabled',
        errorCode: 'account_disabled',
        ...refs,
        accountId: realm.accountId,
      };
    }

    return { authenticated: true, token, realm, account, fingerprint };
  }

  /** Usage bookkeeping never changes the decision. */
  private async touch(token: AuthToken, sourceIp: string): Promise<void> {
    try {
      await this.store.tokens.recordUsage(token.id, sourceIp, this.now().toISOString());
    } catch (err) {
      log.warn('Failed to record token usage', {
        tokenId: token.id,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private getDecoyHash(): string {
    if (!this.decoyHash) {
      this.decoyHash = hashToken('rdg_decoy_0000000000000000', this.decoyIterations);
    }
    return this.decoyHash;
  }
}
