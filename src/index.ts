/**
 * realm-dns-gate: token-authenticated DNS update proxy.
 *
 * Public exports for programmatic use. `main.ts` starts the HTTP server.
 */

export { createApp, createAppContext, seedDemoData } from './server';
export type { AppContext, AppContextOptions, DemoData } from './server';
export { loadConfig, DEFAULT_CONFIG } from './config';
export type { AppConfig } from './config';
export * from './domain';
export * from './storage/store';
export { createMemoryStore } from './storage/memory-store';
export * from './auth/ip-whitelist';
export * from './auth/token-format';
export * from './auth/token-authenticator';
export * from './auth/token-service';
export * from './authorization/domain-name';
export * from './authorization/realm-authorizer';
export * from './authorization/realm-service';
export * from './gateway/dns-gateway';
export * from './api/rate-limit';
export * from './audit/audit-service';
export * from './proxy/update-processor';
export { createLogger, logger, LogLevel, setLogHandler, setLogLevel } from './logger';
export type { Logger, LogEntry, LogHandler } from './logger';
