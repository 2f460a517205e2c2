/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import { v4 as uuid } from 'uuid';
import { AppConfig, DEFAULT_CONFIG } from './config';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { AuditService } from './audit/audit-service';
import { TokenAuthenticator } from './auth/token-authenticator';
import { TokenService } from './auth/token-service';
import { DEFAULT_PBKDF2_ITERATIONS } from './auth/token-hash';
import { DnsGateway, InMemoryDnsGateway } from './gateway/dns-gateway';
import { CounterStore, MemoryCounterStore, RateLimiter } from './api/rate-limit';
import { UpdateProcessor } from './proxy/update-processor';
import { createDdnsRoutes } from './api/ddns';
import { createDnsRoutes } from './api/dns';
import { errorHandler } from './api/middleware';
import { Operation, RealmType } from './domain/realm';
import { RealmService } from './authorization/realm-service';
import { logger } from './logger';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: AppConfig;
  store: Store;
  gateway: DnsGateway;
  rateLimiter: RateLimiter;
  auditService: AuditService;
  authenticator: TokenAuthenticator;
  tokenService: TokenService;
  realmService: RealmService;
  processor: UpdateProcessor;
  /** Release timers held by in-process collaborators. */
  close(): void;
}

export interface AppContextOptions {
  config?: AppConfig;
  store?: Store;
  gateway?: DnsGateway;
  counterStore?: CounterStore;
  /** PBKDF2 work factor for issued tokens. */
  hashIterations?: number;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config = options.config ?? DEFAULT_CONFIG;
  const store = options.store ?? createMemoryStore();
  const gateway = options.gateway ?? new InMemoryDnsGateway();
  const hashIterations = options.hashIterations ?? DEFAULT_PBKDF2_ITERATIONS;

  const counters = options.counterStore ?? new MemoryCounterStore();
  const rateLimiter = new RateLimiter(counters, config.rateLimit);

  const auditService = new AuditService(store);
  const authenticator = new TokenAuthenticator(store, { decoyHashIterations: hashIterations });
  const tokenService = new TokenService(store, { hashIterations });
  const realmService = new RealmService(store, { broadRangePolicy: config.broadRangePolicy });
  const processor = new UpdateProcessor({
    store,
    authenticator,
    auditService,
    gateway,
    rateLimiter,
    options: {
      ddnsEnabled: config.ddnsEnabled,
      autoIpKeywords: config.autoIpKeywords,
      broadRangePolicy: config.broadRangePolicy,
    },
  });

  return {
    config,
    store,
    gateway,
    rateLimiter,
    auditService,
    authenticator,
    tokenService,
    realmService,
    processor,
    close: () => {
      if (counters instanceof MemoryCounterStore && counters !== options.counterStore) counters.close();
    },
  };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();
  const { trustProxy } = ctx.config;

  // Body parsing
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: false, limit: '16kb' }));

  // Health check: uptime and storage type
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
      ddnsEnabled: ctx.config.ddnsEnabled,
    });
  });

  app.use('/api/ddns', createDdnsRoutes(ctx.processor, { trustProxy }));
  app.use('/api', createDnsRoutes(ctx.processor, { trustProxy }));

  // Error handler
  app.use(errorHandler);

  return app;
}

export interface DemoData {
  accountId: string;
  realmId: string;
  tokenId: string;
  rawToken: string;
}

const DEMO_ZONE = 'example.test';

/**
 * Seed one account, a managed zone, a realm and a token for local use. The
 * raw token is logged once.
 */
export async function seedDemoData(ctx: AppContext): Promise<DemoData> {
  const now = new Date().toISOString();
  const store = ctx.store;

  const account = await store.accounts.create({
    id: `acct_${uuid()}`,
    username: 'demo',
    email: 'demo@example.test',
    // No portal login here; '!' matches no password hash.
    passwordHash: '!',
    isApproved: true,
    isActive: true,
    createdAt: now,
    updatedAt: now,
  });

  await store.domainRoots.put({
    rootDomain: DEMO_ZONE,
    backendServiceId: 'memory',
    allowApexAccess: false,
    minSubdomainDepth: 1,
    maxSubdomainDepth: 3,
  });
  if (ctx.gateway instanceof InMemoryDnsGateway) {
    ctx.gateway.addZone(DEMO_ZONE, [{ hostname: `home.${DEMO_ZONE}`, type: 'A', destination: '192.0.2.10' }]);
  }

  const defined = await ctx.realmService.createRealm(account.id, {
    realmType: RealmType.Host,
    realmValue: `home.${DEMO_ZONE}`,
    recordTypes: ['A', 'AAAA'],
    operations: [Operation.Read, Operation.Update],
  });
  if (!defined.success) {
    throw new Error(`Demo realm could not be created: ${defined.error.message}`);
  }
  const realm = (await ctx.realmService.approveRealm(defined.realm.id)) ?? defined.realm;

  const result = await ctx.tokenService.createToken({ realmId: realm.id, alias: 'demo' });
  if (!result.success) {
    throw new Error(`Demo token could not be created: ${result.error.message}`);
  }

  logger.info('Demo data seeded', {
    accountId: account.id,
    realm: realm.realmValue,
    rawToken: result.issued.rawToken,
  });

  return {
    accountId: account.id,
    realmId: realm.id,
    tokenId: result.issued.token.id,
    rawToken: result.issued.rawToken,
  };
}
