/**
 * Shared fixtures. Tokens are written straight into the store with a low
 * PBKDF2 work factor so tests stay fast.
 */

import { parseToken } from '../../src/auth/token-format';
import { hashToken } from '../../src/auth/token-hash';
import { Account } from '../../src/domain/account';
import { Realm, RealmStatus, RealmType } from '../../src/domain/realm';
import { AuthToken } from '../../src/domain/token';
import { Store } from '../../src/storage/store';

export const TEST_HASH_ITERATIONS = 1000;
/** Shortest token shape the format admits. */
export const FIXTURE_TOKEN = 'rdg_dev_abcdefgh1234';
/** Same lookup prefix as FIXTURE_TOKEN, different secret. */
export const WRONG_SECRET_TOKEN = 'rdg_dev_abcdefgh9999';
/** Well-formed token whose prefix matches nothing. */
export const UNKNOWN_TOKEN = 'rdg_dev_zzzzzzzz1234';

const FIXED_TIME = '2026-01-01T00:00:00.000Z';
let sequence = 0;

export async function createAccount(store: Store, overrides: Partial<Account> = {}): Promise<Account> {
  sequence++;
  return store.accounts.create({
    id: `acct_test${sequence}`,
    username: `user${sequence}`,
    email: `user${sequence}@example.test`,
    passwordHash: '!',
    isApproved: true,
    isActive: true,
    createdAt: FIXED_TIME,
    updatedAt: FIXED_TIME,
    ...overrides,
  });
}

export async function createRealm(store: Store, accountId: string, overrides: Partial<Realm> = {}): Promise<Realm> {
  sequence++;
  return store.realms.create({
    id: `realm_test${sequence}`,
    accountId,
    realmType: RealmType.Host,
    realmValue: 'home.example.com',
    allowedIpRanges: [],
    status: RealmStatus.Approved,
    createdAt: FIXED_TIME,
    ...overrides,
  });
}

export async function createToken(
  store: Store,
  realmId: string,
  raw: string = FIXTURE_TOKEN,
  overrides: Partial<AuthToken> = {},
): Promise<AuthToken> {
  const parsed = parseToken(raw);
  if (!parsed) throw new Error(`Fixture token is malformed: ${raw}`);
  sequence++;
  return store.tokens.create({
    id: `tok_test${sequence}`,
    realmId,
    alias: parsed.alias,
    tokenPrefix: parsed.prefix,
    secretHash: hashToken(raw, TEST_HASH_ITERATIONS),
    isActive: true,
    useCount: 0,
    createdAt: FIXED_TIME,
    ...overrides,
  });
}

export interface Grant {
  account: Account;
  realm: Realm;
  token: AuthToken;
  raw: string;
}

/** Account → realm → token in one call. */
export async function seedGrant(
  store: Store,
  realm: Partial<Realm> = {},
  raw: string = FIXTURE_TOKEN,
  token: Partial<AuthToken> = {},
): Promise<Grant> {
  const account = await createAccount(store);
  const storedRealm = await createRealm(store, account.id, realm);
  const storedToken = await createToken(store, storedRealm.id, raw, token);
  return { account, realm: storedRealm, token: storedToken, raw };
}
