/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Every value crossing
 * the store boundary is deep-copied, so callers can never mutate stored state
 * through a returned object.
 */

import { Account } from '../domain/account';
import { ActivityRecord } from '../domain/activity';
import { DomainRootPolicy, Realm } from '../domain/realm';
import { AuthToken } from '../domain/token';
import { depthBelow, isValidHostname, normalizeHostname } from '../authorization/domain-name';
import {
  AccountStore,
  ActivityQuery,
  ActivityStore,
  DomainRootStore,
  ListOptions,
  RealmStore,
  Store,
  TokenStore,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

/**
 * Returned objects must never alias internal state. `structuredClone` when
 * available, JSON round-trip otherwise.
 */
function deepCopy<T>(obj: T): T {
  if (typeof structuredClone === 'function') {
    return structuredClone(obj);
  }
  return JSON.parse(JSON.stringify(obj));
}

class MemoryTokenStore implements TokenStore {
  private data = new Map<string, AuthToken>();
  /** tokenPrefix -> token id */
  private prefixIndex = new Map<string, string>();

  async create(token: AuthToken): Promise<AuthToken> {
    if (this.prefixIndex.has(token.tokenPrefix)) {
      throw new Error(`Token prefix already in use: ${token.tokenPrefix}`);
    }
    this.data.set(token.id, deepCopy(token));
    this.prefixIndex.set(token.tokenPrefix, token.id);
    return deepCopy(token);
  }

  async getById(id: string): Promise<AuthToken | null> {
    const token = this.data.get(id);
    return token ? deepCopy(token) : null;
  }

  async getByPrefix(prefix: string): Promise<AuthToken | null> {
    const id = this.prefixIndex.get(prefix);
    if (id === undefined) return null;
    return this.getById(id);
  }

  async listByRealm(realmId: string): Promise<AuthToken[]> {
    return [...this.data.values()].filter((t) => t.realmId === realmId).map(deepCopy);
  }

  async update(id: string, updates: Partial<Omit<AuthToken, 'id' | 'realmId'>>): Promise<AuthToken | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    if (updates.tokenPrefix !== undefined && updates.tokenPrefix !== existing.tokenPrefix) {
      if (this.prefixIndex.has(updates.tokenPrefix)) {
        throw new Error(`Token prefix already in use: ${updates.tokenPrefix}`);
      }
      this.prefixIndex.delete(existing.tokenPrefix);
      this.prefixIndex.set(updates.tokenPrefix, id);
    }
    const updated = { ...deepCopy(existing), ...deepCopy(updates) };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async recordUsage(id: string, sourceIp: string, at: string): Promise<void> {
    const existing = this.data.get(id);
    if (!existing) return;
    existing.lastUsedAt = at;
    existing.lastUsedIp = sourceIp;
    existing.useCount += 1;
  }

  async delete(id: string): Promise<boolean> {
    const token = this.data.get(id);
    if (!token) return false;
    this.prefixIndex.delete(token.tokenPrefix);
    return this.data.delete(id);
  }

  async deleteByRealm(realmId: string): Promise<void> {
    for (const token of [...this.data.values()]) {
      if (token.realmId === realmId) await this.delete(token.id);
    }
  }
}

class MemoryRealmStore implements RealmStore {
  private data = new Map<string, Realm>();

  constructor(private readonly tokens: MemoryTokenStore) {}

  async create(realm: Realm): Promise<Realm> {
    const duplicate = [...this.data.values()].some(
      (r) => r.accountId === realm.accountId && r.realmValue === realm.realmValue && r.realmType === realm.realmType,
    );
    if (duplicate) {
      throw new Error(`Realm already exists: ${realm.realmType} ${realm.realmValue}`);
    }
    this.data.set(realm.id, deepCopy(realm));
    return deepCopy(realm);
  }

  async getById(id: string): Promise<Realm | null> {
    const realm = this.data.get(id);
    return realm ? deepCopy(realm) : null;
  }

  async listByAccount(accountId: string, options?: ListOptions): Promise<Realm[]> {
    const items = [...this.data.values()].filter((r) => r.accountId === accountId);
    return applyListOptions(items.map(deepCopy), options);
  }

  async update(id: string, updates: Partial<Omit<Realm, 'id' | 'accountId'>>): Promise<Realm | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates) };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async delete(id: string): Promise<boolean> {
    if (!this.data.has(id)) return false;
    await this.tokens.deleteByRealm(id);
    return this.data.delete(id);
  }
}

class MemoryAccountStore implements AccountStore {
  private data = new Map<string, Account>();

  constructor(private readonly realms: MemoryRealmStore) {}

  async create(account: Account): Promise<Account> {
    const username = account.username.toLowerCase();
    for (const existing of this.data.values()) {
      if (existing.username.toLowerCase() === username) {
        throw new Error(`Username already taken: ${account.username}`);
      }
      if (existing.email === account.email) {
        throw new Error(`Email already registered: ${account.email}`);
      }
    }
    this.data.set(account.id, deepCopy(account));
    return deepCopy(account);
  }

  async getById(id: string): Promise<Account | null> {
    const account = this.data.get(id);
    return account ? deepCopy(account) : null;
  }

  async getByUsername(username: string): Promise<Account | null> {
    const wanted = username.toLowerCase();
    const account = [...this.data.values()].find((a) => a.username.toLowerCase() === wanted);
    return account ? deepCopy(account) : null;
  }

  async update(id: string, updates: Partial<Omit<Account, 'id'>>): Promise<Account | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates), updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async delete(id: string): Promise<boolean> {
    if (!this.data.has(id)) return false;
    for (const realm of await this.realms.listByAccount(id, { limit: Number.MAX_SAFE_INTEGER })) {
      await this.realms.delete(realm.id);
    }
    return this.data.delete(id);
  }
}

class MemoryActivityStore implements ActivityStore {
  private data: ActivityRecord[] = [];

  async append(record: ActivityRecord): Promise<ActivityRecord> {
    this.data.push(deepCopy(record));
    return deepCopy(record);
  }

  async list(query?: ActivityQuery): Promise<ActivityRecord[]> {
    const items = this.data
      .filter((r) => !query?.accountId || r.accountId === query.accountId)
      .filter((r) => !query?.tokenId || r.tokenId === query.tokenId)
      .filter((r) => !query?.since || r.timestamp >= query.since)
      .reverse();
    return applyListOptions(items.map(deepCopy), query);
  }
}

class MemoryDomainRootStore implements DomainRootStore {
  private data = new Map<string, DomainRootPolicy>();

  async put(policy: DomainRootPolicy): Promise<DomainRootPolicy> {
    const rootDomain = normalizeHostname(policy.rootDomain);
    const stored = { ...deepCopy(policy), rootDomain };
    this.data.set(rootDomain, stored);
    return deepCopy(stored);
  }

  async policyFor(domain: string): Promise<DomainRootPolicy | null> {
    if (!isValidHostname(domain)) return null;
    let best: DomainRootPolicy | null = null;
    let bestLabels = -1;
    for (const policy of this.data.values()) {
      if (depthBelow(domain, policy.rootDomain) === null) continue;
      const labels = policy.rootDomain.split('.').length;
      if (labels > bestLabels) {
        best = policy;
        bestLabels = labels;
      }
    }
    return best ? deepCopy(best) : null;
  }

  async list(): Promise<DomainRootPolicy[]> {
    return [...this.data.values()].map(deepCopy);
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  const tokens = new MemoryTokenStore();
  const realms = new MemoryRealmStore(tokens);
  return {
    accounts: new MemoryAccountStore(realms),
    realms,
    tokens,
    activity: new MemoryActivityStore(),
    domainRoots: new MemoryDomainRootStore(),
  };
}
