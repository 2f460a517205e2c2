/**
 * Activity audit service.
 *
 * Appends one immutable record per request. Records carry a token
 * fingerprint rather than the token, and their details pass through secret
 * redaction. A failed append is logged and rethrown; it is never dropped.
 */

import { v4 as uuid } from 'uuid';
import {
  ActivityErrorCode,
  ActivityRecord,
  ATTACK_SEVERITIES,
  ERROR_SEVERITY,
  Severity,
} from '../domain/activity';
import { redactSecrets } from '../domain/errors';
import { createLogger } from '../logger';
import { Store } from '../storage/store';

const log = createLogger({ module: 'audit' });

/** Input for creating an activity record. */
export type ActivityInput = Omit<ActivityRecord, 'id' | 'timestamp' | 'isAttack' | 'severity'> & {
  /** Overrides the default severity of `errorCode`. */
  severity?: Severity;
};

/** Activity query options. */
export interface ActivityQueryOptions {
  accountId?: string;
  tokenId?: string;
  limit?: number;
  offset?: number;
}

export interface SecurityStats {
  windowMs: number;
  total: number;
  failures: number;
  attacks: number;
  byErrorCode: Partial<Record<ActivityErrorCode, number>>;
  bySeverity: Record<Severity, number>;
}

/** Upper bound on records scanned for statistics. */
const STATS_SCAN_LIMIT = 10_000;

export class AuditService {
  constructor(
    private store: Store,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Record one activity entry. Rejects when the store write fails. */
  async record(input: ActivityInput): Promise<ActivityRecord> {
    const severity = input.status === 'success'
      ? undefined
      : input.severity ?? (input.errorCode ? ERROR_SEVERITY[input.errorCode] : undefined);

    const record: ActivityRecord = {
      ...input,
      id: `act_${uuid()}`,
      timestamp: this.now().toISOString(),
      severity,
      isAttack: severity !== undefined && ATTACK_SEVERITIES.includes(severity),
      details: input.details ? redactSecrets(input.details) : undefined,
    };

    try {
      return await this.store.activity.append(record);
    } catch (err) {
      log.error('Activity log write failed', {
        activityType: record.activityType,
        errorCode: record.errorCode,
        sourceIp: record.sourceIp,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  /** Query activity records, newest first. */
  async query(options: ActivityQueryOptions = {}): Promise<ActivityRecord[]> {
    return this.store.activity.list({
      accountId: options.accountId,
      tokenId: options.tokenId,
      limit: options.limit,
      offset: options.offset,
    });
  }

  /** Counts of non-success activity within the trailing window. */
  async securityStats(windowMs: number): Promise<SecurityStats> {
    const since = new Date(this.now().getTime() - windowMs).toISOString();
    const records = await this.store.activity.list({ since, limit: STATS_SCAN_LIMIT });

    const stats: SecurityStats = {
      windowMs,
      total: records.length,
      failures: 0,
      attacks: 0,
      byErrorCode: {},
      bySeverity: { low: 0, medium: 0, high: 0, critical: 0 },
    };

    for (const record of records) {
      if (record.status === 'success') continue;
      stats.failures++;
      if (record.isAttack) stats.attacks++;
      if (record.errorCode) {
        stats.byErrorCode[record.errorCode] = (stats.byErrorCode[record.errorCode] ?? 0) + 1;
      }
      if (record.severity) stats.bySeverity[record.severity]++;
    }
    return stats;
  }
}
