/**
 * Storage layer interfaces.
 *
 * Defines the contract for data persistence with pluggable backends. The
 * update path needs only atomic single-row reads, single-row token usage
 * updates and append-only activity writes; no multi-row transactions.
 */

import { Account } from '../domain/account';
import { ActivityRecord } from '../domain/activity';
import { DomainRootPolicy, Realm } from '../domain/realm';
import { AuthToken } from '../domain/token';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Store interface for accounts. Deleting an account removes its realms and tokens. */
export interface AccountStore {
  create(account: Account): Promise<Account>;
  getById(id: string): Promise<Account | null>;
  getByUsername(username: string): Promise<Account | null>;
  update(id: string, updates: Partial<Omit<Account, 'id'>>): Promise<Account | null>;
  delete(id: string): Promise<boolean>;
}

/**
 * Store interface for realms. `(accountId, realmValue, realmType)` is unique;
 * `create` rejects a duplicate. Deleting a realm removes its tokens.
 */
export interface RealmStore {
  create(realm: Realm): Promise<Realm>;
  getById(id: string): Promise<Realm | null>;
  listByAccount(accountId: string, options?: ListOptions): Promise<Realm[]>;
  update(id: string, updates: Partial<Omit<Realm, 'id' | 'accountId'>>): Promise<Realm | null>;
  delete(id: string): Promise<boolean>;
}

/** Store interface for tokens. `tokenPrefix` is globally unique. */
export interface TokenStore {
  create(token: AuthToken): Promise<AuthToken>;
  getById(id: string): Promise<AuthToken | null>;
  /** Single indexed lookup used by authentication. */
  getByPrefix(prefix: string): Promise<AuthToken | null>;
  listByRealm(realmId: string): Promise<AuthToken[]>;
  update(id: string, updates: Partial<Omit<AuthToken, 'id' | 'realmId'>>): Promise<AuthToken | null>;
  /** Single-row usage bump after a successful authentication. */
  recordUsage(id: string, sourceIp: string, at: string): Promise<void>;
  delete(id: string): Promise<boolean>;
}

/** Activity query filters. */
export interface ActivityQuery extends ListOptions {
  accountId?: string;
  tokenId?: string;
  /** Only entries at or after this ISO timestamp. */
  since?: string;
}

/** Append-only store for activity records. Newest first on read. */
export interface ActivityStore {
  append(record: ActivityRecord): Promise<ActivityRecord>;
  list(query?: ActivityQuery): Promise<ActivityRecord[]>;
}

/** Read-mostly store of managed domain roots. */
export interface DomainRootStore {
  put(policy: DomainRootPolicy): Promise<DomainRootPolicy>;
  /** Policy of the longest managed root containing `domain`, if any. */
  policyFor(domain: string): Promise<DomainRootPolicy | null>;
  list(): Promise<DomainRootPolicy[]>;
}

/** Composite store interface. */
export interface Store {
  accounts: AccountStore;
  realms: RealmStore;
  tokens: TokenStore;
  activity: ActivityStore;
  domainRoots: DomainRootStore;
}
