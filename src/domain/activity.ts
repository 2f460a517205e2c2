/**
 * Activity log domain model.
 *
 * Immutable audit records, one per request attempt. Account, realm and token
 * references are optional because many failures happen before any of them
 * is resolved.
 */

/** Activity categories. */
export type ActivityType =
  | 'dns_update'
  | 'dns_read'
  | 'failed_auth'
  | 'security_event'
  | 'rate_limited';

/** Request outcome as recorded in the log. */
export type ActivityStatus = 'success' | 'failure' | 'error';

export type Severity = 'low' | 'medium' | 'high' | 'critical';

/** Machine-readable error codes written to the log. */
export type ActivityErrorCode =
  // Authentication
  | 'missing_token'
  | 'token_malformed'
  | 'token_not_found'
  | 'token_hash_mismatch'
  | 'token_revoked'
  | 'token_expired'
  | 'realm_not_approved'
  | 'account_disabled'
  // Authorization
  | 'ip_denied'
  | 'ip_whitelist_invalid'
  | 'out_of_scope'
  | 'apex_denied'
  | 'depth_out_of_range'
  | 'operation_not_allowed'
  | 'record_type_not_allowed'
  // Request
  | 'invalid_hostname'
  | 'invalid_ip'
  | 'invalid_record'
  | 'record_not_found'
  | 'ddns_disabled'
  | 'rate_limited'
  // Outcome
  | 'backend_error'
  | 'internal_fault';

/** Default severity for each error code. */
export const ERROR_SEVERITY: Record<ActivityErrorCode, Severity> = {
  missing_token: 'low',
  token_malformed: 'low',
  // Known token prefix space is being probed.
  token_not_found: 'high',
  // Prefix matched, secret did not: brute force against a real token.
  token_hash_mismatch: 'critical',
  token_revoked: 'high',
  token_expired: 'low',
  realm_not_approved: 'low',
  account_disabled: 'medium',
  ip_denied: 'critical',
  ip_whitelist_invalid: 'critical',
  out_of_scope: 'high',
  apex_denied: 'high',
  depth_out_of_range: 'medium',
  operation_not_allowed: 'medium',
  record_type_not_allowed: 'low',
  invalid_hostname: 'low',
  invalid_ip: 'low',
  invalid_record: 'low',
  record_not_found: 'low',
  ddns_disabled: 'low',
  rate_limited: 'medium',
  backend_error: 'medium',
  internal_fault: 'critical',
};

/** Severities that flag an entry as a likely attack. */
export const ATTACK_SEVERITIES: readonly Severity[] = ['high', 'critical'];

/** An immutable activity record. */
export interface ActivityRecord {
  id: string;
  timestamp: string;
  accountId?: string;
  realmId?: string;
  tokenId?: string;
  activityType: ActivityType;
  sourceIp: string;
  userAgent?: string;
  status: ActivityStatus;
  errorCode?: ActivityErrorCode;
  severity?: Severity;
  isAttack: boolean;
  /** Which surface handled the request: `dyndns2`, `noip` or `api`. */
  protocol?: string;
  domain?: string;
  recordTypes?: string[];
  operation?: string;
  /** Authorization verdict, once the request got that far. */
  decision?: 'allowed' | 'denied';
  /** Short SHA-256 fingerprint of the presented token, never the token. */
  tokenFingerprint?: string;
  /** Redacted request and response context. */
  details?: Record<string, unknown>;
}
