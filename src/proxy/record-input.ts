/**
 * Validation of record bodies sent to the JSON record API.
 */

import { isIP } from 'net';
import { depthBelow, isValidHostname, normalizeHostname } from '../authorization/domain-name';
import { isRecordType } from '../domain/realm';
import { DnsRecordInput } from '../gateway/dns-gateway';

export type RecordInputResult =
  | { ok: true; record: DnsRecordInput }
  | { ok: false; message: string };

const MAX_DESTINATION_LENGTH = 4096;
const MAX_TTL = 2_147_483_647;
const HOST_TARGET_TYPES = new Set(['CNAME', 'NS', 'MX']);

/**
 * Parse `{ hostname, type, destination, ttl?, priority? }`. `hostname` is a
 * fully qualified name at or below `zone`; `type` is upper-cased before it is
 * checked.
 */
export function parseRecordInput(body: unknown, zone: string): RecordInputResult {
  if (!isJsonObject(body)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }
  const { hostname, type, destination, ttl, priority } = body;

  if (typeof hostname !== 'string' || typeof type !== 'string' || typeof destination !== 'string') {
    return { ok: false, message: 'Required fields: hostname, type, destination' };
  }

  const name = normalizeHostname(hostname);
  if (!isValidHostname(name) || depthBelow(name, zone) === null) {
    return { ok: false, message: `hostname must be a valid name within ${normalizeHostname(zone)}` };
  }

  const recordType = type.trim().toUpperCase();
  if (!isRecordType(recordType)) {
    return { ok: false, message: `Unsupported record type: ${type}` };
  }

  const target = destination.trim();
  if (target.length === 0 || target.length > MAX_DESTINATION_LENGTH) {
    return { ok: false, message: 'destination must be a non-empty string' };
  }
  if (recordType === 'A' && isIP(target) !== 4) {
    return { ok: false, message: 'A record destination must be an IPv4 address' };
  }
  if (recordType === 'AAAA' && isIP(target) !== 6) {
    return { ok: false, message: 'AAAA record destination must be an IPv6 address' };
  }
  if (HOST_TARGET_TYPES.has(recordType) && !isValidHostname(target)) {
    return { ok: false, message: `${recordType} record destination must be a host name` };
  }

  const record: DnsRecordInput = { hostname: name, type: recordType, destination: target };

  if (ttl !== undefined) {
    if (!isIntegerInRange(ttl, 1, MAX_TTL)) return { ok: false, message: 'ttl must be a positive integer' };
    record.ttl = ttl;
  }
  if (priority !== undefined) {
    if (!isIntegerInRange(priority, 0, 65535)) return { ok: false, message: 'priority must be an integer 0-65535' };
    record.priority = priority;
  }
  return { ok: true, record };
}

function isIntegerInRange(value: unknown, min: number, max: number): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
