/**
 * DNS backend gateway.
 *
 * The proxy talks to its DNS provider only through this interface. Concrete
 * provider clients (a registrar API, PowerDNS) live outside this package; the
 * in-memory gateway below backs development and tests.
 */

import { v4 as uuid } from 'uuid';
import { normalizeHostname } from '../authorization/domain-name';

export interface DnsRecord {
  id: string;
  /** Fully qualified owner name, lower case. */
  hostname: string;
  type: string;
  destination: string;
  ttl?: number;
  priority?: number;
}

export type DnsRecordInput = Omit<DnsRecord, 'id'>;

export type RecordChange =
  | { action: 'create'; record: DnsRecordInput }
  | { action: 'update'; id: string; record: DnsRecordInput }
  | { action: 'delete'; id: string };

export type GatewayResult =
  | { success: true; records: DnsRecord[] }
  | { success: false; error: string };

export interface DnsGateway {
  /** Current records of a zone. */
  listRecords(zone: string): Promise<GatewayResult>;
  /** Apply changes atomically; returns the zone's records afterwards. */
  apply(zone: string, changes: RecordChange[]): Promise<GatewayResult>;
}

/** Gateway over a process-local map of zones. */
export class InMemoryDnsGateway implements DnsGateway {
  private zones = new Map<string, DnsRecord[]>();
  private failure: string | null = null;

  /** Make every subsequent call fail with `message` until cleared with null. */
  setFailure(message: string | null): void {
    this.failure = message;
  }

  /** Create a zone, optionally with initial records. */
  addZone(zone: string, records: DnsRecordInput[] = []): DnsRecord[] {
    const created = records.map((record) => withId(record));
    this.zones.set(normalizeHostname(zone), created);
    return created.map((r) => ({ ...r }));
  }

  async listRecords(zone: string): Promise<GatewayResult> {
    if (this.failure) return { success: false, error: this.failure };
    const records = this.zones.get(normalizeHostname(zone));
    if (!records) return { success: false, error: `Unknown zone: ${zone}` };
    return { success: true, records: records.map((r) => ({ ...r })) };
  }

  async apply(zone: string, changes: RecordChange[]): Promise<GatewayResult> {
    if (this.failure) return { success: false, error: this.failure };
    const key = normalizeHostname(zone);
    const current = this.zones.get(key);
    if (!current) return { success: false, error: `Unknown zone: ${zone}` };

    const next = current.map((r) => ({ ...r }));
    for (const change of changes) {
      switch (change.action) {
        case 'create':
          next.push(withId(change.record));
          break;
        case 'update': {
          const index = next.findIndex((r) => r.id === change.id);
          if (index === -1) return { success: false, error: `Unknown record: ${change.id}` };
          next[index] = { ...normalizeRecord(change.record), id: change.id };
          break;
        }
        case 'delete': {
          const index = next.findIndex((r) => r.id === change.id);
          if (index === -1) return { success: false, error: `Unknown record: ${change.id}` };
          next.splice(index, 1);
          break;
        }
      }
    }

    this.zones.set(key, next);
    return { success: true, records: next.map((r) => ({ ...r })) };
  }
}

function normalizeRecord(record: DnsRecordInput): DnsRecordInput {
  return { ...record, hostname: normalizeHostname(record.hostname) };
}

function withId(record: DnsRecordInput): DnsRecord {
  return { id: `rec_${uuid()}`, ...normalizeRecord(record) };
}
