/**
 * Realm lifecycle: define, approve, reject.
 *
 * New realms start out pending; tokens bound to them do not authenticate
 * until the realm is approved.
 */

import { v4 as uuid } from 'uuid';
import { IpRangeOptions } from '../auth/ip-whitelist';
import { createTypedError, notFoundError, TypedError, validationError } from '../domain/errors';
import {
  canonicalRealmValue,
  isOperation,
  Realm,
  RealmDefinition,
  RealmStatus,
  RealmType,
  validateRealmDefinition,
} from '../domain/realm';
import { createLogger } from '../logger';
import { Store } from '../storage/store';

const log = createLogger({ module: 'realm-service' });

export type RealmServiceResult =
  | { success: true; realm: Realm }
  | { success: false; error: TypedError };

export class RealmService {
  constructor(
    private readonly store: Store,
    private readonly ipOptions: IpRangeOptions = {},
  ) {}

  async createRealm(accountId: string, definition: RealmDefinition): Promise<RealmServiceResult> {
    const issues = validateRealmDefinition(definition, this.ipOptions);
    if (issues.length > 0) {
      return {
        success: false,
        error: validationError('Invalid realm definition', { issues }),
      };
    }

    const account = await this.store.accounts.getById(accountId);
    if (!account) {
      return { success: false, error: notFoundError('Account', accountId) };
    }

    const realmValue = canonicalRealmValue(definition.realmValue);
    const realmType = toRealmType(definition.realmType);
    const existing = await this.store.realms.listByAccount(accountId, { limit: Number.MAX_SAFE_INTEGER });
    if (existing.some((r) => r.realmValue === realmValue && r.realmType === realmType)) {
      return {
        success: false,
        error: createTypedError({
          code: 'VALIDATION.CONFLICT',
          message: `Realm already exists: ${realmType} ${realmValue}`,
        }),
      };
    }

    const realm: Realm = {
      id: `realm_${uuid()}`,
      accountId,
      realmType,
      realmValue,
      recordTypes: definition.recordTypes?.length ? [...definition.recordTypes] : undefined,
      operations: definition.operations?.length ? definition.operations.filter(isOperation) : undefined,
      allowedIpRanges: definition.allowedIpRanges?.map((range) => range.trim()) ?? [],
      status: RealmStatus.Pending,
      createdAt: new Date().toISOString(),
    };
    const stored = await this.store.realms.create(realm);
    log.info('Realm created', { realmId: stored.id, accountId, realmType, realmValue });
    return { success: true, realm: stored };
  }

  async approveRealm(realmId: string): Promise<Realm | null> {
    return this.setStatus(realmId, RealmStatus.Approved);
  }

  async rejectRealm(realmId: string): Promise<Realm | null> {
    return this.setStatus(realmId, RealmStatus.Rejected);
  }

  private async setStatus(realmId: string, status: RealmStatus): Promise<Realm | null> {
    const updated = await this.store.realms.update(realmId, { status });
    if (updated) log.info('Realm status changed', { realmId, status });
    return updated;
  }
}

function toRealmType(value: string): RealmType {
  switch (value) {
    case RealmType.Host:
      return RealmType.Host;
    case RealmType.Subdomain:
      return RealmType.Subdomain;
    default:
      return RealmType.Wildcard;
  }
}
