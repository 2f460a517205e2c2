/**
 * DDNS response vocabulary. Bodies are compared exactly: clients parse the
 * first word.
 */

import {
  DdnsProtocol,
  parseDdnsHostname,
  renderDdnsResponse,
  resolveDdnsAddress,
} from '../../src/domain/ddns-protocol';
import { DenyReason, IpDenyReason, RequestOutcome } from '../../src/domain/decision';

const FAILURES: Array<[string, RequestOutcome, { status: number; body: string }, { status: number; body: string }]> = [
  ['unauthenticated', { kind: 'unauthenticated', reason: 'not_found' }, { status: 401, body: 'badauth' }, { status: 401, body: 'badauth' }],
  ['denied', { kind: 'denied', reason: 'out_of_scope' }, { status: 403, body: '!yours' }, { status: 403, body: 'nohost' }],
  ['invalid', { kind: 'invalid', reason: 'invalid_hostname' }, { status: 400, body: 'notfqdn' }, { status: 400, body: 'nohost' }],
  ['backend_error', { kind: 'backend_error' }, { status: 502, body: 'dnserr' }, { status: 502, body: 'dnserr' }],
  ['internal_fault', { kind: 'internal_fault' }, { status: 500, body: '911' }, { status: 500, body: '911' }],
  ['rate_limited', { kind: 'rate_limited', retryAfterMs: 1000 }, { status: 429, body: 'abuse' }, { status: 429, body: 'abuse' }],
];

describe('renderDdnsResponse', () => {
  test.each(FAILURES)('%s', (_kind, outcome, dyndns2, noip) => {
    expect(renderDdnsResponse('dyndns2', outcome)).toEqual(dyndns2);
    expect(renderDdnsResponse('noip', outcome)).toEqual(noip);
  });

  test.each<DdnsProtocol>(['dyndns2', 'noip'])('%s reports changes and no-ops with the address', (protocol) => {
    expect(renderDdnsResponse(protocol, { kind: 'success', changed: true, ip: '203.0.113.7' })).toEqual({
      status: 200,
      body: 'good 203.0.113.7',
    });
    expect(renderDdnsResponse(protocol, { kind: 'success', changed: false, ip: '2001:db8::7' })).toEqual({
      status: 200,
      body: 'nochg 2001:db8::7',
    });
  });

  test('answers 911 for a success without an address', () => {
    expect(renderDdnsResponse('dyndns2', { kind: 'success', changed: true })).toEqual({ status: 500, body: '911' });
  });

  test('never renders a denial as success', () => {
    const reasons: Array<DenyReason | IpDenyReason> = [
      'out_of_scope',
      'record_type_not_allowed',
      'operation_not_allowed',
      'apex_denied',
      'depth_out_of_range',
      'ip_denied',
      'ip_whitelist_invalid',
    ];
    for (const protocol of ['dyndns2', 'noip'] as const) {
      for (const reason of reasons) {
        const response = renderDdnsResponse(protocol, { kind: 'denied', reason });
        expect(response.status).toBe(403);
        expect(response.body).not.toMatch(/^(good|nochg)/);
      }
    }
  });

  test('uses the same body for every authentication failure', () => {
    const bodies = (['missing', 'malformed', 'not_found', 'invalid_credential', 'expired_or_disabled'] as const).map(
      (reason) => renderDdnsResponse('dyndns2', { kind: 'unauthenticated', reason }).body,
    );
    expect(new Set(bodies)).toEqual(new Set(['badauth']));
  });
});

describe('parseDdnsHostname', () => {
  test('normalizes the name', () => {
    expect(parseDdnsHostname('Home.Example.COM.')).toBe('home.example.com');
  });

  test('uses only the first entry of a list', () => {
    expect(parseDdnsHostname('a.example.com,b.example.com')).toBe('a.example.com');
  });

  test.each([undefined, '', 'not a host', 'localhost', ',a.example.com'])('rejects %j', (value) => {
    expect(parseDdnsHostname(value)).toBeNull();
  });
});

describe('resolveDdnsAddress', () => {
  const keywords = ['auto', 'public', 'detect'];

  test('uses the client address when myip is missing, empty or a keyword', () => {
    const expected = { ip: '198.51.100.4', recordType: 'A' };
    expect(resolveDdnsAddress(undefined, '198.51.100.4', keywords)).toEqual(expected);
    expect(resolveDdnsAddress('', '198.51.100.4', keywords)).toEqual(expected);
    expect(resolveDdnsAddress('AUTO', '198.51.100.4', keywords)).toEqual(expected);
    expect(resolveDdnsAddress(' detect ', '198.51.100.4', keywords)).toEqual(expected);
  });

  test('uses an explicit address', () => {
    expect(resolveDdnsAddress('203.0.113.9', '198.51.100.4', keywords)).toEqual({
      ip: '203.0.113.9',
      recordType: 'A',
    });
    expect(resolveDdnsAddress('2001:DB8::1', '198.51.100.4', keywords)).toEqual({
      ip: '2001:db8::1',
      recordType: 'AAAA',
    });
  });

  test('reduces an IPv4-mapped address to an A record', () => {
    expect(resolveDdnsAddress('::ffff:203.0.113.9', '198.51.100.4', keywords)).toEqual({
      ip: '203.0.113.9',
      recordType: 'A',
    });
  });

  test('rejects values that are not addresses', () => {
    expect(resolveDdnsAddress('999.1.1.1', '198.51.100.4', keywords)).toBeNull();
    expect(resolveDdnsAddress('myself', '198.51.100.4', keywords)).toBeNull();
  });
});
