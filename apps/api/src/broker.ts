import type { Pool } from "pg";
import { CredentialResolver } from "./auth/credential-resolver.js";
import { EntraTokenClient, type TokenEndpointClient } from "./auth/identity-provider.js";
import { RequestAuthenticator } from "./auth/request-authenticator.js";
import { RemoteSigningKeyResolver, type SigningKeyResolver } from "./auth/signing-keys.js";
import { buildSystemIdentity, type SystemIdentity } from "./auth/system-identity.js";
import {
  MemoryTenantStore,
  PostgresTenantStore,
  TenantRegistry,
  type TenantStore
} from "./auth/tenant-registry.js";
import { TokenCache } from "./auth/token-cache.js";
import { TokenValidator } from "./auth/token-validator.js";
import type { ApiConfig } from "./config/index.js";
import { SentinelClient } from "./downstream/sentinel-client.js";
import { createPool } from "./lib/db.js";
import type { LoggerLike } from "./lib/logger.js";
import { FixedWindowRateLimiter } from "./lib/rate-limiter.js";

export interface BrokerOptions {
  config: ApiConfig;
  logger: LoggerLike;
  fetch?: typeof globalThis.fetch;
  now?: () => Date;
  signingKeys?: SigningKeyResolver;
  tenantStore?: TenantStore;
  tokenClient?: TokenEndpointClient;
  systemIdentity?: SystemIdentity;
}

/**
 * The identity core with its shared state. One instance per process; every
 * component receives its collaborators here instead of reaching for globals.
 */
export interface Broker {
  config: ApiConfig;
  registry: TenantRegistry;
  cache: TokenCache;
  validator: TokenValidator;
  resolver: CredentialResolver;
  authenticator: RequestAuthenticator;
  sentinel: SentinelClient;
  systemIdentity: SystemIdentity;
  close(): Promise<void>;
}

function resolveTenantStore(options: BrokerOptions): { store: TenantStore; pool: Pool | null } {
  if (options.tenantStore) {
    return { store: options.tenantStore, pool: null };
  }

  if (options.config.databaseUrl) {
    const pool = createPool(options.config.databaseUrl);
    return { store: new PostgresTenantStore(pool), pool };
  }

  return { store: new MemoryTenantStore(), pool: null };
}

export async function createBroker(options: BrokerOptions): Promise<Broker> {
  const { config, logger } = options;
  const now = options.now ?? (() => new Date());
  const { store, pool } = resolveTenantStore(options);

  const registry = new TenantRegistry({
    homeTenantId: config.homeTenantId,
    multiTenantEnabled: config.multiTenantEnabled,
    autoDiscoveryEnabled: config.autoDiscoveryEnabled,
    tenants: config.tenants,
    discoveryLimiter: new FixedWindowRateLimiter({
      windowMs: config.discoveryWindowSeconds * 1000,
      maxEvents: config.discoveryMaxObservations
    }),
    store,
    logger,
    now
  });

  try {
    await registry.hydrate();
  } catch (error) {
    await pool?.end();
    throw error;
  }

  const cache = new TokenCache({
    safetyMarginSeconds: config.tokenSafetyMarginSeconds,
    maxEntries: config.tokenCacheMaxEntries,
    now
  });

  const tokenClient =
    options.tokenClient ??
    new EntraTokenClient({
      authorityHost: config.authorityHost,
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      timeoutMs: config.httpTimeoutMs,
      fetch: options.fetch,
      now
    });

  const systemIdentity = options.systemIdentity ?? buildSystemIdentity(config);

  const validator = new TokenValidator({
    config,
    registry,
    signingKeys:
      options.signingKeys ??
      new RemoteSigningKeyResolver({
        authorityHost: config.authorityHost,
        timeoutMs: config.httpTimeoutMs,
        retain: (tenantId) => registry.isAuthorized(tenantId)
      }),
    logger,
    now
  });

  const resolver = new CredentialResolver({
    tokenClient,
    systemIdentity,
    cache,
    registry,
    logger,
    now
  });

  const sentinel = new SentinelClient({
    managementEndpoint: config.managementEndpoint,
    apiVersion: config.sentinelApiVersion,
    timeoutMs: config.httpTimeoutMs,
    fetch: options.fetch
  });

  logger.info(
    {
      homeTenantId: config.homeTenantId,
      multiTenantEnabled: config.multiTenantEnabled,
      autoDiscoveryEnabled: config.autoDiscoveryEnabled,
      systemIdentity: systemIdentity.kind,
      persistence: pool ? "postgres" : "memory"
    },
    "Identity broker initialised"
  );

  return {
    config,
    registry,
    cache,
    validator,
    resolver,
    authenticator: new RequestAuthenticator({ validator, resolver }),
    sentinel,
    systemIdentity,
    async close() {
      cache.flush();
      await pool?.end();
    }
  };
}
