/**
 * Realm domain model.
 *
 * A realm is a permission grant owned by an account: a domain pattern plus
 * optional record-type, operation and source-address restrictions. Every
 * token is bound to exactly one realm.
 */

import { isValidHostname, normalizeHostname } from '../authorization/domain-name';
import { IpRangeOptions, validateIpRanges } from '../auth/ip-whitelist';

/** How a realm's value is matched against a target domain. */
export enum RealmType {
  /** Exact name only. */
  Host = 'host',
  /** The name itself and everything below it. */
  Subdomain = 'subdomain',
  /** Everything below the name, never the name itself. */
  Wildcard = 'wildcard',
}

/** Realm approval workflow state. Only approved realms authenticate. */
export enum RealmStatus {
  Pending = 'pending',
  Approved = 'approved',
  Rejected = 'rejected',
}

/** Operations a realm can grant. */
export enum Operation {
  Read = 'read',
  Create = 'create',
  Update = 'update',
  Delete = 'delete',
}

/** Canonical DNS record type symbols accepted in realm restrictions. */
export const RECORD_TYPES = [
  'A',
  'AAAA',
  'CNAME',
  'TXT',
  'MX',
  'NS',
  'SRV',
  'SSHFP',
  'CAA',
  'TLSA',
] as const;

export type RecordType = (typeof RECORD_TYPES)[number];

export function isRecordType(value: string): value is RecordType {
  return RECORD_TYPES.some((type) => type === value);
}

export function isOperation(value: string): value is Operation {
  return Object.values(Operation).some((op) => op === value);
}

export interface Realm {
  id: string;
  accountId: string;
  realmType: RealmType;
  /** Lower-case FQDN the realm is scoped to. */
  realmValue: string;
  /** Allowed record types; undefined or empty grants every type. */
  recordTypes?: string[];
  /** Allowed operations; undefined or empty grants every operation. */
  operations?: Operation[];
  /** Ordered CIDR list; empty allows any source address. */
  allowedIpRanges: string[];
  status: RealmStatus;
  createdAt: string;
}

/**
 * Zone-level policy of a managed domain root. Composes with realm
 * restrictions; the stricter of the two always wins.
 */
export interface DomainRootPolicy {
  rootDomain: string;
  backendServiceId: string;
  allowApexAccess: boolean;
  /** Inclusive lower bound on labels below the root. */
  minSubdomainDepth: number;
  /** Inclusive upper bound on labels below the root. */
  maxSubdomainDepth: number;
  allowedRecordTypes?: string[];
  allowedOperations?: Operation[];
}

/** Fields a caller supplies when defining a realm. */
export interface RealmDefinition {
  realmType: string;
  realmValue: string;
  recordTypes?: string[];
  operations?: string[];
  allowedIpRanges?: string[];
}

export interface RealmValidationIssue {
  field: keyof RealmDefinition;
  message: string;
}

/** Validate a realm definition before it is stored. Returns every problem found. */
export function validateRealmDefinition(
  definition: RealmDefinition,
  ipOptions?: IpRangeOptions,
): RealmValidationIssue[] {
  const issues: RealmValidationIssue[] = [];

  if (!Object.values(RealmType).some((type) => type === definition.realmType)) {
    issues.push({
      field: 'realmType',
      message: `Invalid realm type. Must be one of: ${Object.values(RealmType).join(', ')}`,
    });
  }

  if (!isValidHostname(definition.realmValue)) {
    issues.push({ field: 'realmValue', message: `Invalid domain name: ${definition.realmValue}` });
  }

  for (const type of definition.recordTypes ?? []) {
    if (!isRecordType(type)) {
      issues.push({
        field: 'recordTypes',
        message: `Invalid record type: ${type}. Valid types: ${RECORD_TYPES.join(', ')}`,
      });
    }
  }

  for (const op of definition.operations ?? []) {
    if (!isOperation(op)) {
      issues.push({
        field: 'operations',
        message: `Invalid operation: ${op}. Valid operations: ${Object.values(Operation).join(', ')}`,
      });
    }
  }

  for (const problem of validateIpRanges(definition.allowedIpRanges ?? [], ipOptions)) {
    issues.push({ field: 'allowedIpRanges', message: problem });
  }

  return issues;
}

/** Canonical storage form of a realm value. */
export function canonicalRealmValue(value: string): string {
  return normalizeHostname(value);
}
