/**
 * Request pipeline shared by the DDNS endpoints and the JSON record API.
 *
 *   rate limit → authenticate → source whitelist → parse → authorize
 *     → DNS gateway → exactly one activity record
 *
 * Every stage returns an explicit outcome; a normal denial never throws.
 * An unexpected exception inside a stage becomes `internal_fault`. The
 * activity write happens after the outcome is known and is not guarded: if
 * it fails, the error propagates to the caller.
 */

import { AuthFailure, AuthSuccess, TokenAuthenticator } from '../auth/token-authenticator';
import { BroadRangePolicy, canonicalizeAddress, checkIpWhitelist } from '../auth/ip-whitelist';
import { isValidHostname, normalizeHostname, splitLabels } from '../authorization/domain-name';
import {
  authorize,
  authorizeZoneAccess,
  effectivePermissions,
} from '../authorization/realm-authorizer';
import { ActivityErrorCode, ActivityStatus, ActivityType } from '../domain/activity';
import { DdnsProtocol, parseDdnsHostname, resolveDdnsAddress } from '../domain/ddns-protocol';
import { AuthFailureReason, Decision, InvalidRequestReason, RequestOutcome } from '../domain/decision';
import { DomainRootPolicy, Operation } from '../domain/realm';
import { AuditService } from '../audit/audit-service';
import { DnsGateway, DnsRecord, RecordChange } from '../gateway/dns-gateway';
import { RateLimiter } from '../api/rate-limit';
import { createLogger } from '../logger';
import { Store } from '../storage/store';
import { parseRecordInput } from './record-input';

const log = createLogger({ module: 'update-processor' });

/** What the HTTP layer knows about the caller. */
export interface RequestContext {
  sourceIp: string;
  userAgent?: string;
  /** Presented bearer token, if any. */
  token?: string;
}

export interface DdnsUpdateParams {
  hostname?: string;
  myip?: string;
}

export interface UpdateProcessorOptions {
  ddnsEnabled: boolean;
  autoIpKeywords: string[];
  broadRangePolicy: BroadRangePolicy;
}

export interface UpdateProcessorDeps {
  store: Store;
  authenticator: TokenAuthenticator;
  auditService: AuditService;
  gateway: DnsGateway;
  rateLimiter: RateLimiter;
  options: UpdateProcessorOptions;
}

/** Audit fields gathered while a request moves through the stages. */
interface Frame {
  activityType: Extract<ActivityType, 'dns_update' | 'dns_read'>;
  protocol: string;
  operation: Operation;
  domain?: string;
  recordTypes?: string[];
  decision?: 'allowed' | 'denied';
  accountId?: string;
  realmId?: string;
  tokenId?: string;
  fingerprint?: string;
  details: Record<string, unknown>;
}

/** A terminal outcome plus any audit classification it cannot carry itself. */
interface Terminal {
  outcome: RequestOutcome;
  errorCode?: ActivityErrorCode;
  status?: ActivityStatus;
}

const AUTH_ERROR_CODES: Record<AuthFailureReason, ActivityErrorCode> = {
  missing: 'missing_token',
  malformed: 'token_malformed',
  not_found: 'token_not_found',
  invalid_credential: 'token_hash_mismatch',
  expired_or_disabled: 'token_expired',
};

export class UpdateProcessor {
  private readonly store: Store;
  private readonly authenticator: TokenAuthenticator;
  private readonly auditService: AuditService;
  private readonly gateway: DnsGateway;
  private readonly rateLimiter: RateLimiter;
  private readonly options: UpdateProcessorOptions;

  constructor(deps: UpdateProcessorDeps) {
    this.store = deps.store;
    this.authenticator = deps.authenticator;
    this.auditService = deps.auditService;
    this.gateway = deps.gateway;
    this.rateLimiter = deps.rateLimiter;
    this.options = deps.options;
  }

  // ── DDNS ────────────────────────────────────────────────────────────────

  /** One DynDNS2 or No-IP update. The operation is always `update`. */
  async processDdnsUpdate(
    protocol: DdnsProtocol,
    ctx: RequestContext,
    params: DdnsUpdateParams,
  ): Promise<RequestOutcome> {
    const frame = newFrame('dns_update', protocol, Operation.Update);
    frame.details = { hostname: params.hostname, myip: params.myip };

    if (!this.options.ddnsEnabled) {
      return this.execute(ctx, frame, async () => ({
        outcome: { kind: 'internal_fault' },
        errorCode: 'ddns_disabled',
        status: 'failure',
      }));
    }

    return this.execute(ctx, frame, () => this.guarded(ctx, frame, (grant) => this.ddnsUpdate(grant, ctx, frame, params)));
  }

  private async ddnsUpdate(
    grant: AuthSuccess,
    ctx: RequestContext,
    frame: Frame,
    params: DdnsUpdateParams,
  ): Promise<Terminal> {
    const hostname = parseDdnsHostname(params.hostname);
    if (!hostname) return invalid('invalid_hostname');
    frame.domain = hostname;

    const address = resolveDdnsAddress(params.myip, ctx.sourceIp, this.options.autoIpKeywords);
    if (!address) return invalid('invalid_ip');
    frame.recordTypes = [address.recordType];
    frame.details.ip = address.ip;

    const policy = await this.store.domainRoots.policyFor(hostname);
    const decision = authorize({
      realm: grant.realm,
      targetDomain: hostname,
      recordTypes: [address.recordType],
      operation: Operation.Update,
      policy,
    });
    const denial = recordDecision(frame, decision);
    if (denial) return denial;

    const zone = zoneFor(hostname, policy);
    const listing = await this.gateway.listRecords(zone);
    if (!listing.success) return backendFailure(frame, zone, listing.error);

    const existing = listing.records.find((r) => r.hostname === hostname && r.type === address.recordType);
    if (existing && canonicalizeAddress(existing.destination) === address.ip) {
      return { outcome: { kind: 'success', changed: false, ip: address.ip } };
    }

    const change: RecordChange = existing
      ? { action: 'update', id: existing.id, record: { ...stripId(existing), destination: address.ip } }
      : { action: 'create', record: { hostname, type: address.recordType, destination: address.ip } };
    const applied = await this.gateway.apply(zone, [change]);
    if (!applied.success) return backendFailure(frame, zone, applied.error);

    log.info('DDNS record updated', {
      hostname,
      recordType: address.recordType,
      previous: existing?.destination,
      ip: address.ip,
    });
    return { outcome: { kind: 'success', changed: true, ip: address.ip } };
  }

  // ── JSON record API ─────────────────────────────────────────────────────

  /** Records of `zone` the token may see, plus its effective permissions. */
  async listRecords(ctx: RequestContext, zone: string): Promise<RequestOutcome> {
    const frame = newFrame('dns_read', 'api', Operation.Read);
    return this.execute(ctx, frame, () => this.guarded(ctx, frame, async (grant) => {
      const zoneName = normalizeHostname(zone);
      frame.domain = zoneName;
      if (!isValidHostname(zoneName)) return invalid('invalid_hostname');

      const policy = await this.store.domainRoots.policyFor(zoneName);
      const denial = recordDecision(frame, authorizeZoneAccess(grant.realm, zoneName, Operation.Read, policy));
      if (denial) return denial;

      const listing = await this.gateway.listRecords(zoneName);
      if (!listing.success) return backendFailure(frame, zoneName, listing.error);

      const visible = listing.records.filter((record) =>
        authorize({
          realm: grant.realm,
          targetDomain: record.hostname,
          recordTypes: [record.type],
          operation: Operation.Read,
          policy,
        }).allowed,
      );
      frame.details.recordCount = visible.length;

      const permissions = effectivePermissions(grant.realm, policy);
      return {
        outcome: {
          kind: 'success',
          changed: false,
          payload: { domain: zoneName, records: visible, total: visible.length, permissions },
        },
      };
    }));
  }

  async createRecord(ctx: RequestContext, zone: string, body: unknown): Promise<RequestOutcome> {
    const frame = newFrame('dns_update', 'api', Operation.Create);
    frame.details = { request: body };
    return this.execute(ctx, frame, () => this.guarded(ctx, frame, async (grant) => {
      const zoneName = normalizeHostname(zone);
      frame.domain = zoneName;
      if (!isValidHostname(zoneName)) return invalid('invalid_hostname');

      const parsed = parseRecordInput(body, zoneName);
      if (!parsed.ok) return invalidRecord(frame, parsed.message);
      const { record } = parsed;
      frame.domain = record.hostname;
      frame.recordTypes = [record.type];

      const policy = await this.store.domainRoots.policyFor(record.hostname);
      const denial = recordDecision(frame, authorize({
        realm: grant.realm,
        targetDomain: record.hostname,
        recordTypes: [record.type],
        operation: Operation.Create,
        policy,
      }));
      if (denial) return denial;

      const applied = await this.gateway.apply(zoneName, [{ action: 'create', record }]);
      if (!applied.success) return backendFailure(frame, zoneName, applied.error);

      const created = [...applied.records]
        .reverse()
        .find((r) => r.hostname === record.hostname && r.type === record.type && r.destination === record.destination);
      return { outcome: { kind: 'success', changed: true, payload: { record: created ?? record } } };
    }));
  }

  async updateRecord(ctx: RequestContext, zone: string, recordId: string, body: unknown): Promise<RequestOutcome> {
    const frame = newFrame('dns_update', 'api', Operation.Update);
    frame.details = { recordId, request: body };
    return this.execute(ctx, frame, () => this.guarded(ctx, frame, async (grant) => {
      const zoneName = normalizeHostname(zone);
      frame.domain = zoneName;
      if (!isValidHostname(zoneName)) return invalid('invalid_hostname');

      const parsed = parseRecordInput(body, zoneName);
      if (!parsed.ok) return invalidRecord(frame, parsed.message);
      const { record } = parsed;

      const zonePolicy = await this.store.domainRoots.policyFor(zoneName);
      const zoneDenial = recordDecision(frame, authorizeZoneAccess(grant.realm, zoneName, Operation.Update, zonePolicy));
      if (zoneDenial) return zoneDenial;

      const lookup = await this.findRecord(frame, zoneName, recordId);
      if ('outcome' in lookup) return lookup;
      const existing = lookup.record;
      frame.domain = record.hostname;
      frame.recordTypes = existing.type === record.type ? [record.type] : [existing.type, record.type];

      // Both the record being replaced and its replacement must be in scope.
      for (const target of [existing, record]) {
        const policy = await this.store.domainRoots.policyFor(target.hostname);
        const denial = recordDecision(frame, authorize({
          realm: grant.realm,
          targetDomain: target.hostname,
          recordTypes: [target.type],
          operation: Operation.Update,
          policy,
        }));
        if (denial) return denial;
      }

      const unchanged = existing.hostname === record.hostname
        && existing.type === record.type
        && existing.destination === record.destination
        && existing.ttl === record.ttl
        && existing.priority === record.priority;
      if (unchanged) {
        return { outcome: { kind: 'success', changed: false, payload: { record: existing } } };
      }

      const applied = await this.gateway.apply(zoneName, [{ action: 'update', id: recordId, record }]);
      if (!applied.success) return backendFailure(frame, zoneName, applied.error);
      const updated = applied.records.find((r) => r.id === recordId);
      return { outcome: { kind: 'success', changed: true, payload: { record: updated ?? { ...record, id: recordId } } } };
    }));
  }

  async deleteRecord(ctx: RequestContext, zone: string, recordId: string): Promise<RequestOutcome> {
    const frame = newFrame('dns_update', 'api', Operation.Delete);
    frame.details = { recordId };
    return this.execute(ctx, frame, () => this.guarded(ctx, frame, async (grant) => {
      const zoneName = normalizeHostname(zone);
      frame.domain = zoneName;
      if (!isValidHostname(zoneName)) return invalid('invalid_hostname');

      const zonePolicy = await this.store.domainRoots.policyFor(zoneName);
      const zoneDenial = recordDecision(frame, authorizeZoneAccess(grant.realm, zoneName, Operation.Delete, zonePolicy));
      if (zoneDenial) return zoneDenial;

      const lookup = await this.findRecord(frame, zoneName, recordId);
      if ('outcome' in lookup) return lookup;
      const existing = lookup.record;
      frame.domain = existing.hostname;
      frame.recordTypes = [existing.type];

      const policy = await this.store.domainRoots.policyFor(existing.hostname);
      const denial = recordDecision(frame, authorize({
        realm: grant.realm,
        targetDomain: existing.hostname,
        recordTypes: [existing.type],
        operation: Operation.Delete,
        policy,
      }));
      if (denial) return denial;

      const applied = await this.gateway.apply(zoneName, [{ action: 'delete', id: recordId }]);
      if (!applied.success) return backendFailure(frame, zoneName, applied.error);
      return { outcome: { kind: 'success', changed: true, payload: { deleted: recordId } } };
    }));
  }

  private async findRecord(frame: Frame, zone: string, recordId: string): Promise<{ record: DnsRecord } | Terminal> {
    const listing = await this.gateway.listRecords(zone);
    if (!listing.success) return backendFailure(frame, zone, listing.error);
    const record = listing.records.find((r) => r.id === recordId);
    if (!record) return invalid('record_not_found');
    return { record };
  }

  // ── Shared stages ───────────────────────────────────────────────────────

  /** Rate limit, authentication and source whitelist, then the handler. */
  private async guarded(
    ctx: RequestContext,
    frame: Frame,
    handler: (grant: AuthSuccess) => Promise<Terminal>,
  ): Promise<Terminal> {
    const limit = await this.rateLimiter.check(`ip:${ctx.sourceIp}`);
    if (!limit.allowed) {
      return { outcome: { kind: 'rate_limited', retryAfterMs: limit.retryAfterMs } };
    }

    const auth = await this.authenticator.authenticate(ctx.token, ctx.sourceIp);
    frame.fingerprint = auth.fingerprint;
    if (!auth.authenticated) return authFailure(frame, auth);

    frame.accountId = auth.account.id;
    frame.realmId = auth.realm.id;
    frame.tokenId = auth.token.id;

    const verdict = checkIpWhitelist(auth.realm.allowedIpRanges, ctx.sourceIp, {
      broadRangePolicy: this.options.broadRangePolicy,
    });
    if (!verdict.allowed) {
      if (verdict.error === 'invalid_range' || verdict.error === 'broad_range') {
        frame.details.whitelistError = verdict.error;
        frame.details.whitelistEntry = verdict.entry;
        return { outcome: { kind: 'denied', reason: 'ip_whitelist_invalid' } };
      }
      return { outcome: { kind: 'denied', reason: 'ip_denied' } };
    }

    return handler(auth);
  }

  /** Run a request to its outcome, then write its single activity record. */
  private async execute(ctx: RequestContext, frame: Frame, run: () => Promise<Terminal>): Promise<RequestOutcome> {
    let terminal: Terminal;
    try {
      terminal = await run();
    } catch (err) {
      log.critical('Unexpected fault while processing request', {
        protocol: frame.protocol,
        operation: frame.operation,
        domain: frame.domain,
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
      terminal = { outcome: { kind: 'internal_fault' } };
    }

    const { outcome } = terminal;
    await this.auditService.record({
      activityType: activityTypeFor(outcome, frame.activityType),
      status: terminal.status ?? statusFor(outcome),
      errorCode: terminal.errorCode ?? errorCodeFor(outcome),
      accountId: frame.accountId,
      realmId: frame.realmId,
      tokenId: frame.tokenId,
      sourceIp: ctx.sourceIp,
      userAgent: ctx.userAgent,
      protocol: frame.protocol,
      domain: frame.domain,
      recordTypes: frame.recordTypes,
      operation: frame.operation,
      decision: frame.decision,
      tokenFingerprint: frame.fingerprint,
      details: { ...frame.details, outcome: outcome.kind },
    });
    return outcome;
  }
}

function newFrame(activityType: Frame['activityType'], protocol: string, operation: Operation): Frame {
  return { activityType, protocol, operation, details: {} };
}

function invalid(reason: InvalidRequestReason): Terminal {
  return { outcome: { kind: 'invalid', reason } };
}

function invalidRecord(frame: Frame, message: string): Terminal {
  frame.details.validation = message;
  return { outcome: { kind: 'invalid', reason: 'invalid_record', message } };
}

function authFailure(frame: Frame, auth: AuthFailure): Terminal {
  frame.tokenId = auth.tokenId;
  frame.realmId = auth.realmId;
  frame.accountId = auth.accountId;
  return { outcome: { kind: 'unauthenticated', reason: auth.reason }, errorCode: auth.errorCode };
}

/** Note the verdict on the frame; a denial becomes the terminal outcome. */
function recordDecision(frame: Frame, decision: Decision): Terminal | null {
  frame.decision = decision.allowed ? 'allowed' : 'denied';
  if (decision.allowed) return null;
  return { outcome: { kind: 'denied', reason: decision.reason } };
}

function backendFailure(frame: Frame, zone: string, error: string): Terminal {
  log.warn('DNS backend request failed', { zone, error });
  frame.details.backendError = error;
  return { outcome: { kind: 'backend_error' } };
}

/** Managed root when one applies, otherwise the last two labels. */
function zoneFor(hostname: string, policy: DomainRootPolicy | null): string {
  if (policy) return policy.rootDomain;
  return splitLabels(hostname).slice(-2).join('.');
}

function stripId(record: DnsRecord): Omit<DnsRecord, 'id'> {
  return {
    hostname: record.hostname,
    type: record.type,
    destination: record.destination,
    ttl: record.ttl,
    priority: record.priority,
  };
}

function activityTypeFor(outcome: RequestOutcome, requested: Frame['activityType']): ActivityType {
  switch (outcome.kind) {
    case 'rate_limited':
      return 'rate_limited';
    case 'unauthenticated':
      return 'failed_auth';
    case 'denied':
      return 'security_event';
    default:
      return requested;
  }
}

function statusFor(outcome: RequestOutcome): ActivityStatus {
  switch (outcome.kind) {
    case 'success':
      return 'success';
    case 'backend_error':
    case 'internal_fault':
      return 'error';
    case 'denied':
      return outcome.reason === 'ip_whitelist_invalid' ? 'error' : 'failure';
    default:
      return 'failure';
  }
}

function errorCodeFor(outcome: RequestOutcome): ActivityErrorCode | undefined {
  switch (outcome.kind) {
    case 'success':
      return undefined;
    case 'unauthenticated':
      return AUTH_ERROR_CODES[outcome.reason];
    case 'denied':
    case 'invalid':
      return outcome.reason;
    case 'rate_limited':
      return 'rate_limited';
    case 'backend_error':
      return 'backend_error';
    case 'internal_fault':
      return 'internal_fault';
  }
}
