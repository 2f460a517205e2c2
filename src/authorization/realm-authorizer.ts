/**
 * Realm authorization engine.
 *
 * Decides whether an authenticated token's realm permits an operation on a
 * target domain for a set of record types, under the zone-level policy of
 * the managed domain root the target belongs to.
 *
 * Evaluation order is fixed: domain scope first (realm scope, then root
 * policy apex and depth rules), then operation, then record types. A request
 * outside the realm is therefore always reported as a scope failure and
 * never reveals which operations or types the realm would have allowed.
 */

import { ALLOW, Decision, deny } from '../domain/decision';
import { DomainRootPolicy, Operation, Realm, RealmType } from '../domain/realm';
import { depthBelow, isValidHostname } from './domain-name';

/** The realm fields the engine reads. */
export type RealmGrant = Pick<Realm, 'realmType' | 'realmValue' | 'recordTypes' | 'operations'>;

export interface AuthorizationRequest {
  realm: RealmGrant;
  targetDomain: string;
  /** Record types the request touches; empty for type-agnostic reads. */
  recordTypes: string[];
  operation: Operation;
  /** Policy of the managed root; null when the realm uses its own backend. */
  policy: DomainRootPolicy | null;
}

/** Decide a single request. Pure; never throws. */
export function authorize(request: AuthorizationRequest): Decision {
  const scope = checkScope(request.realm, request.targetDomain, request.policy);
  if (!scope.allowed) return scope;

  const { realm, policy } = request;

  if (!isPermitted(request.operation, realm.operations) || !isPermitted(request.operation, policy?.allowedOperations)) {
    return deny('operation_not_allowed');
  }

  if (!request.recordTypes.every((type) => isRecordTypePermitted(type, realm, policy))) {
    return deny('record_type_not_allowed');
  }

  return ALLOW;
}

/** Domain scope only: realm pattern, then the root policy's apex and depth bounds. */
export function checkScope(realm: RealmGrant, targetDomain: string, policy: DomainRootPolicy | null): Decision {
  if (!isValidHostname(targetDomain) || !isValidHostname(realm.realmValue)) {
    return deny('out_of_scope');
  }

  const depth = depthBelow(targetDomain, realm.realmValue);
  switch (realm.realmType) {
    case RealmType.Host:
      if (depth !== 0) return deny('out_of_scope');
      break;
    case RealmType.Subdomain:
      if (depth === null) return deny('out_of_scope');
      break;
    case RealmType.Wildcard:
      if (depth === null) return deny('out_of_scope');
      // Hard rule: a wildcard never covers its own bare name.
      if (depth === 0) return deny('apex_denied');
      break;
    default:
      return deny('out_of_scope');
  }

  if (!policy) return ALLOW;

  const rootDepth = depthBelow(targetDomain, policy.rootDomain);
  if (rootDepth === null) return deny('out_of_scope');
  if (rootDepth === 0) {
    return policy.allowApexAccess ? ALLOW : deny('apex_denied');
  }
  if (rootDepth < policy.minSubdomainDepth || rootDepth > policy.maxSubdomainDepth) {
    return deny('depth_out_of_range');
  }
  return ALLOW;
}

/**
 * Zone-level gate for the record API, checked before any record is looked
 * up: the realm must overlap the zone (realm at or below it, or the zone
 * below the realm) and both layers must grant the operation. Individual
 * records are then decided with {@link authorize}.
 */
export function authorizeZoneAccess(
  realm: RealmGrant,
  zone: string,
  operation: Operation,
  policy: DomainRootPolicy | null,
): Decision {
  if (!isValidHostname(zone) || !isValidHostname(realm.realmValue)) {
    return deny('out_of_scope');
  }
  const overlaps = depthBelow(realm.realmValue, zone) !== null || depthBelow(zone, realm.realmValue) !== null;
  if (!overlaps) return deny('out_of_scope');
  if (!isPermitted(operation, realm.operations) || !isPermitted(operation, policy?.allowedOperations)) {
    return deny('operation_not_allowed');
  }
  return ALLOW;
}

/** An unset or empty allow-list places no restriction at its layer. */
function isPermitted(value: string, allowList: readonly string[] | undefined): boolean {
  if (!allowList || allowList.length === 0) return true;
  return allowList.includes(value);
}

/**
 * Effective grant after intersecting realm and root policy. Undefined means
 * unrestricted; an empty list means the two layers share nothing.
 */
export interface EffectivePermissions {
  recordTypes?: string[];
  operations?: Operation[];
}

export function effectivePermissions(realm: RealmGrant, policy: DomainRootPolicy | null): EffectivePermissions {
  return {
    recordTypes: intersect(realm.recordTypes, policy?.allowedRecordTypes),
    operations: intersect(realm.operations, policy?.allowedOperations),
  };
}

function intersect<T extends string>(a: T[] | undefined, b: T[] | undefined): T[] | undefined {
  const left = a && a.length > 0 ? a : undefined;
  const right = b && b.length > 0 ? b : undefined;
  if (!left) return right ? [...right] : undefined;
  if (!right) return [...left];
  return left.filter((value) => right.includes(value));
}

/** Whether a single record type passes both layers. */
export function isRecordTypePermitted(type: string, realm: RealmGrant, policy: DomainRootPolicy | null): boolean {
  return isPermitted(type, realm.recordTypes) && isPermitted(type, policy?.allowedRecordTypes);
}
