/**
 * Source address whitelist.
 *
 * A realm may restrict which client addresses can use its tokens. Entries are
 * CIDR ranges or bare addresses (treated as /32 or /128), IPv4 or IPv6.
 *
 * Rules:
 * - An empty whitelist allows every source.
 * - One malformed entry fails the whole check closed. Skipping it could widen
 *   access, so the request is denied and reported as a configuration error.
 * - `/0` ranges are refused unless `broadRangePolicy` is `warn`.
 * - Sources are normalized before matching: an IPv4-mapped IPv6 address
 *   (`::ffff:192.0.2.1`, as reported by dual-stack sockets) becomes its IPv4
 *   form. Ranges are never rewritten, and an address only ever matches ranges
 *   of its own family. A range such as `::ffff:0:0/96` therefore matches
 *   nothing.
 */

import { isIP } from 'net';
import { createLogger } from '../logger';

const log = createLogger({ module: 'ip-whitelist' });

export type BroadRangePolicy = 'reject' | 'warn';

export interface IpRangeOptions {
  /** How `0.0.0.0/0` and `::/0` are treated. Default: reject. */
  broadRangePolicy?: BroadRangePolicy;
}

type IpFamily = 4 | 6;

interface ParsedAddress {
  family: IpFamily;
  value: bigint;
}

interface ParsedRange extends ParsedAddress {
  prefix: number;
  source: string;
}

export type IpWhitelistError = 'invalid_range' | 'broad_range' | 'invalid_source';

export type IpWhitelistVerdict =
  | { allowed: true; matchedRange?: string }
  | { allowed: false; error?: IpWhitelistError; entry?: string };

const FAMILY_BITS: Record<IpFamily, number> = { 4: 32, 6: 128 };
const IPV4_MAPPED_PREFIX = 0xffffn;

/** Boolean form of {@link checkIpWhitelist}. */
export function isIpAllowed(ranges: readonly string[], sourceIp: string, options?: IpRangeOptions): boolean {
  return checkIpWhitelist(ranges, sourceIp, options).allowed;
}

/** Check a source address against an ordered whitelist. */
export function checkIpWhitelist(
  ranges: readonly string[],
  sourceIp: string,
  options?: IpRangeOptions,
): IpWhitelistVerdict {
  if (ranges.length === 0) return { allowed: true };

  const policy = options?.broadRangePolicy ?? 'reject';
  const parsed: ParsedRange[] = [];
  for (const entry of ranges) {
    const range = parseRange(entry);
    if (!range) {
      log.error('Malformed whitelist entry, denying request', { entry });
      return { allowed: false, error: 'invalid_range', entry };
    }
    if (range.prefix === 0) {
      if (policy === 'reject') {
        log.error('Whole-address-space whitelist entry refused', { entry });
        return { allowed: false, error: 'broad_range', entry };
      }
      log.warn('Whitelist entry admits every address', { entry });
    }
    parsed.push(range);
  }

  const source = normalizeSourceAddress(sourceIp);
  if (!source) return { allowed: false, error: 'invalid_source' };

  for (const range of parsed) {
    if (rangeContains(range, source)) return { allowed: true, matchedRange: range.source };
  }
  return { allowed: false };
}

/** List the problems in a whitelist without checking any address. */
export function validateIpRanges(ranges: readonly string[], options?: IpRangeOptions): string[] {
  const policy = options?.broadRangePolicy ?? 'reject';
  const problems: string[] = [];
  for (const entry of ranges) {
    const range = parseRange(entry);
    if (!range) {
      problems.push(`Invalid IP range: ${entry}`);
    } else if (range.prefix === 0 && policy === 'reject') {
      problems.push(`IP range admits every address: ${entry}`);
    }
  }
  return problems;
}

/**
 * Parse a client address into canonical text, applying the IPv4-mapped
 * normalization. Returns null for anything that is not an address.
 */
export function canonicalizeAddress(address: string): string | null {
  const parsed = normalizeSourceAddress(address);
  if (!parsed) return null;
  return parsed.family === 4 ? formatIpv4(parsed.value) : formatIpv6(parsed.value);
}

export function addressFamily(address: string): IpFamily | null {
  return normalizeSourceAddress(address)?.family ?? null;
}

function normalizeSourceAddress(address: string): ParsedAddress | null {
  const parsed = parseAddress(address.trim());
  if (!parsed) return null;
  if (parsed.family === 6 && parsed.value >> 32n === IPV4_MAPPED_PREFIX) {
    return { family: 4, value: parsed.value & 0xffffffffn };
  }
  return parsed;
}

function parseRange(entry: string): ParsedRange | null {
  const trimmed = entry.trim();
  const slash = trimmed.indexOf('/');
  const addressText = slash === -1 ? trimmed : trimmed.slice(0, slash);
  const address = parseAddress(addressText);
  if (!address) return null;

  const maxPrefix = FAMILY_BITS[address.family];
  let prefix = maxPrefix;
  if (slash !== -1) {
    const prefixText = trimmed.slice(slash + 1);
    if (!/^\d{1,3}$/.test(prefixText)) return null;
    prefix = Number(prefixText);
    if (prefix > maxPrefix) return null;
  }
  return { ...address, prefix, source: entry };
}

function rangeContains(range: ParsedRange, address: ParsedAddress): boolean {
  if (range.family !== address.family) return false;
  const shift = BigInt(FAMILY_BITS[range.family] - range.prefix);
  return range.value >> shift === address.value >> shift;
}

function parseAddress(text: string): ParsedAddress | null {
  // Zone identifiers (fe80::1%eth0) are host-local and never whitelisted.
  if (text.includes('%')) return null;
  const version = isIP(text);
  if (version === 4) return { family: 4, value: ipv4ToBigInt(text) };
  if (version === 6) return { family: 6, value: ipv6ToBigInt(text) };
  return null;
}

function ipv4ToBigInt(text: string): bigint {
  return text.split('.').reduce((acc, octet) => (acc << 8n) + BigInt(Number(octet)), 0n);
}

function ipv6ToBigInt(text: string): bigint {
  let body = text.toLowerCase();
  // Embedded dotted quad in the last 32 bits.
  const lastColon = body.lastIndexOf(':');
  const tail = body.slice(lastColon + 1);
  if (tail.includes('.')) {
    const v4 = ipv4ToBigInt(tail);
    body = `${body.slice(0, lastColon + 1)}${(v4 >> 16n).toString(16)}:${(v4 & 0xffffn).toString(16)}`;
  }

  const [head, rest] = body.split('::');
  const headGroups = head ? head.split(':') : [];
  const restGroups = rest === undefined ? [] : rest ? rest.split(':') : [];
  const missing = 8 - headGroups.length - restGroups.length;
  const groups = rest === undefined
    ? headGroups
    : [...headGroups, ...Array<string>(missing).fill('0'), ...restGroups];

  return groups.reduce((acc, group) => (acc << 16n) + BigInt(parseInt(group, 16)), 0n);
}

function formatIpv4(value: bigint): string {
  return [24n, 16n, 8n, 0n].map((shift) => ((value >> shift) & 0xffn).toString()).join('.');
}

function formatIpv6(value: bigint): string {
  const groups: number[] = [];
  for (let shift = 112n; shift >= 0n; shift -= 16n) {
    groups.push(Number((value >> shift) & 0xffffn));
  }

  // Compress the longest run of two or more zero groups.
  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < groups.length; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < groups.length && groups[j] === 0) j++;
    if (j - i > bestLength && j - i >= 2) {
      bestStart = i;
      bestLength = j - i;
    }
    i = j;
  }

  const hex = groups.map((group) => group.toString(16));
  if (bestStart === -1) return hex.join(':');
  const left = hex.slice(0, bestStart).join(':');
  const right = hex.slice(bestStart + bestLength).join(':');
  return `${left}::${right}`;
}
