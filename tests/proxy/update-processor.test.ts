/**
 * Request pipeline: stage ordering, outcome mapping and the one activity
 * record written per request.
 */

import { AppConfig } from '../../src/config';
import { Operation, RealmType } from '../../src/domain/realm';
import { InMemoryDnsGateway } from '../../src/gateway/dns-gateway';
import { RequestContext } from '../../src/proxy/update-processor';
import { AppContext } from '../../src/server';
import { createTestContext } from '../helpers/context';
import { FIXTURE_TOKEN, Grant, seedGrant, UNKNOWN_TOKEN, WRONG_SECRET_TOKEN } from '../helpers/fixtures';

const CLIENT: RequestContext = { sourceIp: '198.51.100.4', userAgent: 'test-client/1.0', token: FIXTURE_TOKEN };

async function setup(config: Partial<AppConfig> = {}): Promise<{ ctx: AppContext; gateway: InMemoryDnsGateway; grant: Grant }> {
  const { ctx, gateway } = createTestContext(config);
  await ctx.store.domainRoots.put({
    rootDomain: 'example.com',
    backendServiceId: 'memory',
    allowApexAccess: false,
    minSubdomainDepth: 1,
    maxSubdomainDepth: 3,
  });
  gateway.addZone('example.com', [
    { hostname: 'home.example.com', type: 'A', destination: '192.0.2.10' },
    { hostname: 'home.example.com', type: 'TXT', destination: 'v=home' },
    { hostname: 'www.example.com', type: 'A', destination: '192.0.2.80' },
  ]);
  const grant = await seedGrant(ctx.store, {
    realmType: RealmType.Host,
    realmValue: 'home.example.com',
    recordTypes: ['A', 'AAAA'],
    operations: [Operation.Read, Operation.Update],
  });
  return { ctx, gateway, grant };
}

describe('UpdateProcessor', () => {
  let ctx: AppContext;
  let gateway: InMemoryDnsGateway;
  let grant: Grant;

  beforeEach(async () => {
    ({ ctx, gateway, grant } = await setup());
  });

  afterEach(() => {
    jest.restoreAllMocks();
    ctx.close();
  });

  async function records(hostname: string, type: string): Promise<string[]> {
    const listing = await gateway.listRecords('example.com');
    if (!listing.success) throw new Error(listing.error);
    return listing.records.filter((r) => r.hostname === hostname && r.type === type).map((r) => r.destination);
  }

  describe('processDdnsUpdate', () => {
    test('updates an existing record and audits the success', async () => {
      const outcome = await ctx.processor.processDdnsUpdate('dyndns2', CLIENT, {
        hostname: 'home.example.com',
        myip: '203.0.113.7',
      });

      expect(outcome).toEqual({ kind: 'success', changed: true, ip: '203.0.113.7' });
      expect(await records('home.example.com', 'A')).toEqual(['203.0.113.7']);

      const activity = await ctx.store.activity.list();
      expect(activity).toHaveLength(1);
      expect(activity[0]).toMatchObject({
        activityType: 'dns_update',
        status: 'success',
        accountId: grant.account.id,
        realmId: grant.realm.id,
        tokenId: grant.token.id,
        sourceIp: '198.51.100.4',
        userAgent: 'test-client/1.0',
        protocol: 'dyndns2',
        domain: 'home.example.com',
        recordTypes: ['A'],
        operation: 'update',
        decision: 'allowed',
        isAttack: false,
      });
      expect(activity[0].errorCode).toBeUndefined();
      expect(activity[0].details).toEqual({
        hostname: 'home.example.com',
        myip: '203.0.113.7',
        ip: '203.0.113.7',
        outcome: 'success',
      });
    });

    test('reports no change without writing to the backend', async () => {
      const apply = jest.spyOn(gateway, 'apply');
      const outcome = await ctx.processor.processDdnsUpdate('dyndns2', CLIENT, {
        hostname: 'home.example.com',
        myip: '192.0.2.10',
      });

      expect(outcome).toEqual({ kind: 'success', changed: false, ip: '192.0.2.10' });
      expect(apply).not.toHaveBeenCalled();
    });

    test('uses the client address when myip is absent', async () => {
      const outcome = await ctx.processor.processDdnsUpdate('noip', CLIENT, { hostname: 'home.example.com' });
      expect(outcome).toEqual({ kind: 'success', changed: true, ip: '198.51.100.4' });
    });

    test('creates an AAAA record for an IPv6 address', async () => {
      const outcome = await ctx.processor.processDdnsUpdate('dyndns2', CLIENT, {
        hostname: 'home.example.com',
        myip: '2001:db8::10',
      });
      expect(outcome).toEqual({ kind: 'success', changed: true, ip: '2001:db8::10' });
      expect(await records('home.example.com', 'AAAA')).toEqual(['2001:db8::10']);
      expect(await records('home.example.com', 'A')).toEqual(['192.0.2.10']);
    });

    test('denies a host outside the realm and flags it as an attack', async () => {
      const outcome = await ctx.processor.processDdnsUpdate('dyndns2', CLIENT, {
        hostname: 'www.example.com',
        myip: '203.0.113.7',
      });

      expect(outcome).toEqual({ kind: 'denied', reason: 'out_of_scope' });
      expect(await records('www.example.com', 'A')).toEqual(['192.0.2.80']);
      const [entry] = await ctx.store.activity.list();
      expect(entry).toMatchObject({
        activityType: 'security_event',
        status: 'failure',
        errorCode: 'out_of_scope',
        severity: 'high',
        isAttack: true,
        decision: 'denied',
      });
    });

    test('records a missing update operation as a security event', async () => {
      await ctx.store.realms.update(grant.realm.id, { operations: [Operation.Read] });
      const outcome = await ctx.processor.processDdnsUpdate('dyndns2', CLIENT, {
        hostname: 'home.example.com',
        myip: '203.0.113.7',
      });

      expect(outcome).toEqual({ kind: 'denied', reason: 'operation_not_allowed' });
      expect(await records('home.example.com', 'A')).toEqual(['192.0.2.10']);
      const [entry] = await ctx.store.activity.list();
      expect(entry).toMatchObject({
        activityType: 'security_event',
        status: 'failure',
        errorCode: 'operation_not_allowed',
        decision: 'denied',
      });
    });

    test('rejects an invalid hostname before authorization', async () => {
      const outcome = await ctx.processor.processDdnsUpdate('dyndns2', CLIENT, { hostname: 'not a host' });
      expect(outcome).toEqual({ kind: 'invalid', reason: 'invalid_hostname' });
      const [entry] = await ctx.store.activity.list();
      expect(entry.errorCode).toBe('invalid_hostname');
      expect(entry.decision).toBeUndefined();
    });

    test('rejects an invalid address', async () => {
      const outcome = await ctx.processor.processDdnsUpdate('dyndns2', CLIENT, {
        hostname: 'home.example.com',
        myip: '999.0.0.1',
      });
      expect(outcome).toEqual({ kind: 'invalid', reason: 'invalid_ip' });
    });

    test('classifies unknown tokens and wrong secrets differently in the log only', async () => {
      const unknown = await ctx.processor.processDdnsUpdate(
        'dyndns2',
        { ...CLIENT, token: UNKNOWN_TOKEN },
        { hostname: 'home.example.com' },
      );
      const mismatch = await ctx.processor.processDdnsUpdate(
        'dyndns2',
        { ...CLIENT, token: WRONG_SECRET_TOKEN },
        { hostname: 'home.example.com' },
      );

      expect(unknown).toEqual({ kind: 'unauthenticated', reason: 'not_found' });
      expect(mismatch).toEqual({ kind: 'unauthenticated', reason: 'invalid_credential' });

      const [second, first] = await ctx.store.activity.list();
      expect(first).toMatchObject({ activityType: 'failed_auth', errorCode: 'token_not_found', severity: 'high' });
      expect(first.tokenId).toBeUndefined();
      expect(second).toMatchObject({
        activityType: 'failed_auth',
        errorCode: 'token_hash_mismatch',
        severity: 'critical',
        tokenId: grant.token.id,
      });
    });

    test('keeps the fine-grained code for lifecycle failures', async () => {
      await ctx.store.tokens.update(grant.token.id, { expiresAt: '2020-01-01T00:00:00.000Z' });
      const outcome = await ctx.processor.processDdnsUpdate('dyndns2', CLIENT, { hostname: 'home.example.com' });
      expect(outcome).toEqual({ kind: 'unauthenticated', reason: 'expired_or_disabled' });
      const [entry] = await ctx.store.activity.list();
      expect(entry.errorCode).toBe('token_expired');
    });

    test('denies a source outside the whitelist as a security event', async () => {
      await ctx.store.realms.update(grant.realm.id, { allowedIpRanges: ['192.0.2.0/24'] });
      const outcome = await ctx.processor.processDdnsUpdate('dyndns2', CLIENT, { hostname: 'home.example.com' });

      expect(outcome).toEqual({ kind: 'denied', reason: 'ip_denied' });
      const [entry] = await ctx.store.activity.list();
      expect(entry).toMatchObject({
        activityType: 'security_event',
        status: 'failure',
        errorCode: 'ip_denied',
        severity: 'critical',
      });
    });

    test('allows a source inside the whitelist', async () => {
      await ctx.store.realms.update(grant.realm.id, { allowedIpRanges: ['198.51.100.0/24'] });
      const outcome = await ctx.processor.processDdnsUpdate('dyndns2', CLIENT, { hostname: 'home.example.com' });
      expect(outcome.kind).toBe('success');
    });

    test('fails closed on a malformed whitelist', async () => {
      await ctx.store.realms.update(grant.realm.id, { allowedIpRanges: ['198.51.100.0/24', 'garbage'] });
      const outcome = await ctx.processor.processDdnsUpdate('dyndns2', CLIENT, { hostname: 'home.example.com' });

      expect(outcome).toEqual({ kind: 'denied', reason: 'ip_whitelist_invalid' });
      const [entry] = await ctx.store.activity.list();
      expect(entry).toMatchObject({ activityType: 'security_event', status: 'error', errorCode: 'ip_whitelist_invalid' });
      expect(entry.details).toMatchObject({ whitelistError: 'invalid_range', whitelistEntry: 'garbage' });
    });

    test('enforces the root depth policy', async () => {
      const deep = await seedGrant(
        ctx.store,
        { realmType: RealmType.Subdomain, realmValue: 'example.com' },
        'rdg_deep_qrstuvwx5678',
      );
      const outcome = await ctx.processor.processDdnsUpdate(
        'dyndns2',
        { ...CLIENT, token: deep.raw },
        { hostname: 'a.b.c.d.example.com' },
      );
      expect(outcome).toEqual({ kind: 'denied', reason: 'depth_out_of_range' });
    });

    test('maps backend failures to backend_error', async () => {
      gateway.setFailure('connection refused');
      const outcome = await ctx.processor.processDdnsUpdate('dyndns2', CLIENT, { hostname: 'home.example.com' });

      expect(outcome).toEqual({ kind: 'backend_error' });
      const [entry] = await ctx.store.activity.list();
      expect(entry).toMatchObject({ status: 'error', errorCode: 'backend_error' });
      expect(entry.details?.backendError).toBe('connection refused');
    });

    test('maps an unexpected exception to internal_fault', async () => {
      jest.spyOn(ctx.store.domainRoots, 'policyFor').mockRejectedValue(new Error('boom'));
      const outcome = await ctx.processor.processDdnsUpdate('dyndns2', CLIENT, { hostname: 'home.example.com' });

      expect(outcome).toEqual({ kind: 'internal_fault' });
      const [entry] = await ctx.store.activity.list();
      expect(entry).toMatchObject({ status: 'error', errorCode: 'internal_fault', severity: 'critical' });
    });

    test('propagates a failed activity write', async () => {
      jest.spyOn(ctx.store.activity, 'append').mockRejectedValue(new Error('disk full'));
      await expect(
        ctx.processor.processDdnsUpdate('dyndns2', CLIENT, { hostname: 'home.example.com' }),
      ).rejects.toThrow('disk full');
    });

    test('writes exactly one record per request', async () => {
      await ctx.processor.processDdnsUpdate('dyndns2', CLIENT, { hostname: 'home.example.com' });
      await ctx.processor.processDdnsUpdate('dyndns2', { ...CLIENT, token: undefined }, { hostname: 'home.example.com' });
      await ctx.processor.processDdnsUpdate('noip', CLIENT, { hostname: 'www.example.com' });
      await ctx.processor.processDdnsUpdate('noip', CLIENT, {});
      expect(await ctx.store.activity.list()).toHaveLength(4);
    });
  });

  describe('when DDNS is disabled', () => {
    test('answers internal_fault and records ddns_disabled', async () => {
      ctx.close();
      ({ ctx, gateway, grant } = await setup({ ddnsEnabled: false }));

      const outcome = await ctx.processor.processDdnsUpdate('dyndns2', CLIENT, { hostname: 'home.example.com' });
      expect(outcome).toEqual({ kind: 'internal_fault' });
      const [entry] = await ctx.store.activity.list();
      expect(entry).toMatchObject({ status: 'failure', errorCode: 'ddns_disabled', severity: 'low', isAttack: false });
    });
  });

  describe('rate limiting', () => {
    test('refuses requests over the limit before authentication', async () => {
      ctx.close();
      ({ ctx, gateway, grant } = await setup({ rateLimit: { maxRequests: 1, windowMs: 60_000 } }));
      const authenticate = jest.spyOn(ctx.authenticator, 'authenticate');

      await ctx.processor.processDdnsUpdate('dyndns2', CLIENT, { hostname: 'home.example.com' });
      const outcome = await ctx.processor.processDdnsUpdate('dyndns2', CLIENT, { hostname: 'home.example.com' });

      expect(outcome.kind).toBe('rate_limited');
      expect(authenticate).toHaveBeenCalledTimes(1);
      const [entry] = await ctx.store.activity.list();
      expect(entry).toMatchObject({ activityType: 'rate_limited', errorCode: 'rate_limited', status: 'failure' });
    });
  });

  describe('listRecords', () => {
    test('returns only records the realm may read', async () => {
      const outcome = await ctx.processor.listRecords(CLIENT, 'Example.COM');
      expect(outcome.kind).toBe('success');
      if (outcome.kind !== 'success') return;

      expect(outcome.payload).toMatchObject({
        domain: 'example.com',
        total: 1,
        permissions: { recordTypes: ['A', 'AAAA'], operations: ['read', 'update'] },
      });
      expect(outcome.payload?.records).toEqual([
        expect.objectContaining({ hostname: 'home.example.com', type: 'A', destination: '192.0.2.10' }),
      ]);

      const [entry] = await ctx.store.activity.list();
      expect(entry).toMatchObject({ activityType: 'dns_read', operation: 'read', status: 'success' });
    });

    test('denies a zone the realm does not touch', async () => {
      gateway.addZone('example.org');
      const outcome = await ctx.processor.listRecords(CLIENT, 'example.org');
      expect(outcome).toEqual({ kind: 'denied', reason: 'out_of_scope' });
      const [entry] = await ctx.store.activity.list();
      expect(entry).toMatchObject({ activityType: 'security_event', operation: 'read', errorCode: 'out_of_scope' });
    });
  });

  describe('record changes', () => {
    test('rejects an update of an unknown record', async () => {
      const outcome = await ctx.processor.updateRecord(CLIENT, 'example.com', 'rec_missing', {
        hostname: 'home.example.com',
        type: 'A',
        destination: '203.0.113.7',
      });
      expect(outcome).toEqual({ kind: 'invalid', reason: 'record_not_found' });
    });

    test('denies creating without the create operation', async () => {
      const outcome = await ctx.processor.createRecord(CLIENT, 'example.com', {
        hostname: 'home.example.com',
        type: 'TXT',
        destination: 'hello',
      });
      expect(outcome).toEqual({ kind: 'denied', reason: 'operation_not_allowed' });
      const [entry] = await ctx.store.activity.list();
      expect(entry).toMatchObject({
        activityType: 'security_event',
        status: 'failure',
        errorCode: 'operation_not_allowed',
      });
    });

    test('denies deleting without the delete operation', async () => {
      const listing = await gateway.listRecords('example.com');
      if (!listing.success) throw new Error(listing.error);
      const target = listing.records[0];

      const outcome = await ctx.processor.deleteRecord(CLIENT, 'example.com', target.id);
      expect(outcome).toEqual({ kind: 'denied', reason: 'operation_not_allowed' });
      expect(await records('home.example.com', 'A')).toEqual(['192.0.2.10']);
    });

    test('reports an invalid body with its message', async () => {
      const outcome = await ctx.processor.createRecord(CLIENT, 'example.com', { hostname: 'home.example.com' });
      expect(outcome).toEqual({
        kind: 'invalid',
        reason: 'invalid_record',
        message: 'Required fields: hostname, type, destination',
      });
    });
  });
});
