/**
 * Runtime configuration from environment variables.
 *
 * | Variable                  | Default              |
 * |---------------------------|----------------------|
 * | PORT                      | 5000                 |
 * | RDG_TRUST_PROXY           | false                |
 * | RDG_DDNS_ENABLED          | true                 |
 * | RDG_AUTO_IP_KEYWORDS      | auto,public,detect   |
 * | RDG_RATE_LIMIT_MAX        | 60                   |
 * | RDG_RATE_LIMIT_WINDOW_MS  | 60000                |
 * | RDG_BROAD_RANGE_POLICY    | reject               |
 * | RDG_LOG_LEVEL             | info                 |
 * | RDG_SEED_DEMO             | false                |
 */

import { BroadRangePolicy } from './auth/ip-whitelist';
import { isLogLevel, LogLevel } from './logger';

export interface AppConfig {
  port: number;
  /** Honour X-Forwarded-For when detecting the client address. */
  trustProxy: boolean;
  ddnsEnabled: boolean;
  /** `myip` values that mean "use the address you see". Lower case. */
  autoIpKeywords: string[];
  rateLimit: {
    maxRequests: number;
    windowMs: number;
  };
  broadRangePolicy: BroadRangePolicy;
  logLevel: LogLevel;
  seedDemo: boolean;
}

export const DEFAULT_CONFIG: AppConfig = {
  port: 5000,
  trustProxy: false,
  ddnsEnabled: true,
  autoIpKeywords: ['auto', 'public', 'detect'],
  rateLimit: { maxRequests: 60, windowMs: 60_000 },
  broadRangePolicy: 'reject',
  logLevel: LogLevel.Info,
  seedDemo: false,
};

type Env = Record<string, string | undefined>;

/** Build the configuration from `env`. Throws on a value that cannot be parsed. */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: readInteger(env, 'PORT', DEFAULT_CONFIG.port, 0, 65535),
    trustProxy: readBoolean(env, 'RDG_TRUST_PROXY', DEFAULT_CONFIG.trustProxy),
    ddnsEnabled: readBoolean(env, 'RDG_DDNS_ENABLED', DEFAULT_CONFIG.ddnsEnabled),
    autoIpKeywords: readList(env, 'RDG_AUTO_IP_KEYWORDS', DEFAULT_CONFIG.autoIpKeywords),
    rateLimit: {
      maxRequests: readInteger(env, 'RDG_RATE_LIMIT_MAX', DEFAULT_CONFIG.rateLimit.maxRequests, 1),
      windowMs: readInteger(env, 'RDG_RATE_LIMIT_WINDOW_MS', DEFAULT_CONFIG.rateLimit.windowMs, 1),
    },
    broadRangePolicy: readBroadRangePolicy(env),
    logLevel: readLogLevel(env),
    seedDemo: readBoolean(env, 'RDG_SEED_DEMO', DEFAULT_CONFIG.seedDemo),
  };
}

function raw(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInteger(env: Env, name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const value = raw(env, name);
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || parsed < min || parsed > max) {
    throw new Error(`${name} must be an integer between ${min} and ${max}, got "${value}"`);
  }
  return parsed;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const value = raw(env, name)?.toLowerCase();
  if (value === undefined) return fallback;
  if (['true', '1', 'yes', 'on'].includes(value)) return true;
  if (['false', '0', 'no', 'off'].includes(value)) return false;
  throw new Error(`${name} must be a boolean, got "${value}"`);
}

function readList(env: Env, name: string, fallback: string[]): string[] {
  const value = raw(env, name);
  if (value === undefined) return [...fallback];
  return value
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0);
}

function readBroadRangePolicy(env: Env): BroadRangePolicy {
  const value = raw(env, 'RDG_BROAD_RANGE_POLICY')?.toLowerCase();
  if (value === undefined) return DEFAULT_CONFIG.broadRangePolicy;
  if (value === 'reject' || value === 'warn') return value;
  throw new Error(`RDG_BROAD_RANGE_POLICY must be "reject" or "warn", got "${value}"`);
}

function readLogLevel(env: Env): LogLevel {
  const value = raw(env, 'RDG_LOG_LEVEL')?.toLowerCase();
  if (value === undefined) return DEFAULT_CONFIG.logLevel;
  if (isLogLevel(value)) return value;
  throw new Error(`RDG_LOG_LEVEL must be one of ${Object.values(LogLevel).join(', ')}, got "${value}"`);
}
