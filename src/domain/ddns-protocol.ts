/**
 * DDNS protocol adapter.
 *
 * Maps a terminal request outcome onto the exact plain-text vocabulary of
 * the DynDNS2 and No-IP update protocols. Clients parse the first token of
 * the body, so bodies carry no whitespace padding and no internal detail.
 */

import { isValidHostname, normalizeHostname } from '../authorization/domain-name';
import { addressFamily, canonicalizeAddress } from '../auth/ip-whitelist';
import { RequestOutcome, RequestOutcomeKind } from './decision';

export type DdnsProtocol = 'dyndns2' | 'noip';

export const DDNS_PROTOCOLS: readonly DdnsProtocol[] = ['dyndns2', 'noip'];

export interface DdnsResponse {
  status: number;
  body: string;
}

/** Status code word plus HTTP status for each outcome kind other than success. */
type FailureVocabulary = Record<Exclude<RequestOutcomeKind, 'success'>, DdnsResponse>;

const DYNDNS2_FAILURES: FailureVocabulary = {
  unauthenticated: { status: 401, body: 'badauth' },
  denied: { status: 403, body: '!yours' },
  invalid: { status: 400, body: 'notfqdn' },
  backend_error: { status: 502, body: 'dnserr' },
  internal_fault: { status: 500, body: '911' },
  rate_limited: { status: 429, body: 'abuse' },
};

// No-IP has no "not a FQDN" code; its documented answer for an unusable
// hostname is `nohost`, the same word it uses for a host outside the account.
const NOIP_FAILURES: FailureVocabulary = {
  unauthenticated: { status: 401, body: 'badauth' },
  denied: { status: 403, body: 'nohost' },
  invalid: { status: 400, body: 'nohost' },
  backend_error: { status: 502, body: 'dnserr' },
  internal_fault: { status: 500, body: '911' },
  rate_limited: { status: 429, body: 'abuse' },
};

const VOCABULARIES: Record<DdnsProtocol, FailureVocabulary> = {
  dyndns2: DYNDNS2_FAILURES,
  noip: NOIP_FAILURES,
};

/** Render an outcome for the given protocol. */
export function renderDdnsResponse(protocol: DdnsProtocol, outcome: RequestOutcome): DdnsResponse {
  if (outcome.kind === 'success') {
    // A success without an address cannot be expressed in either protocol.
    if (!outcome.ip) return VOCABULARIES[protocol].internal_fault;
    const word = outcome.changed ? 'good' : 'nochg';
    return { status: 200, body: `${word} ${outcome.ip}` };
  }
  return VOCABULARIES[protocol][outcome.kind];
}

/**
 * Extract the target host from a `hostname` parameter. Only the first entry
 * of a comma-separated list is used; multi-host updates are not supported.
 * Returns null when the value is missing or not a valid host name.
 */
export function parseDdnsHostname(value: string | undefined): string | null {
  if (!value) return null;
  const first = normalizeHostname(value.split(',')[0]);
  return isValidHostname(first) ? first : null;
}

export interface DdnsAddress {
  ip: string;
  recordType: 'A' | 'AAAA';
}

/**
 * Resolve the `myip` parameter. Missing, empty or an auto-detect keyword
 * (compared case-insensitively) means the detected client address. Returns
 * null when the result is not an IP address.
 */
export function resolveDdnsAddress(
  myip: string | undefined,
  clientIp: string,
  autoKeywords: readonly string[],
): DdnsAddress | null {
  const requested = myip?.trim() ?? '';
  const useClient = requested === '' || autoKeywords.includes(requested.toLowerCase());
  const source = useClient ? clientIp : requested;
  const ip = canonicalizeAddress(source);
  const family = addressFamily(source);
  if (!ip || !family) return null;
  return { ip, recordType: family === 4 ? 'A' : 'AAAA' };
}
