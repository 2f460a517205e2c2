/**
 * Authorization decisions and terminal request outcomes.
 *
 * Every stage of the update pipeline produces one of these values; none of
 * them signals a normal denial by throwing.
 */

/** Why the realm authorization engine refused a request. */
export type DenyReason =
  | 'out_of_scope'
  | 'record_type_not_allowed'
  | 'operation_not_allowed'
  | 'apex_denied'
  | 'depth_out_of_range';

export type Decision =
  | { allowed: true }
  | { allowed: false; reason: DenyReason };

export const ALLOW: Decision = { allowed: true };

export function deny(reason: DenyReason): Decision {
  return { allowed: false, reason };
}

/** Internal classification of an authentication failure. */
export type AuthFailureReason =
  | 'missing'
  | 'malformed'
  | 'not_found'
  | 'invalid_credential'
  | 'expired_or_disabled';

/** Denials raised outside the realm engine by the source-address check. */
export type IpDenyReason = 'ip_denied' | 'ip_whitelist_invalid';

/** Request-shape problems found before authorization. */
export type InvalidRequestReason =
  | 'invalid_hostname'
  | 'invalid_ip'
  | 'invalid_record'
  | 'record_not_found';

/**
 * Terminal outcome of one update or read request. This is what the protocol
 * adapters and the JSON renderer consume.
 */
export type RequestOutcome =
  | { kind: 'success'; changed: boolean; ip?: string; payload?: Record<string, unknown> }
  | { kind: 'unauthenticated'; reason: AuthFailureReason }
  | { kind: 'denied'; reason: DenyReason | IpDenyReason }
  | { kind: 'invalid'; reason: InvalidRequestReason; message?: string }
  | { kind: 'backend_error' }
  | { kind: 'rate_limited'; retryAfterMs: number }
  | { kind: 'internal_fault' };

export type RequestOutcomeKind = RequestOutcome['kind'];
