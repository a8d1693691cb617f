import { createRemoteJWKSet, type JWTVerifyGetKey } from "jose";

export interface SigningKeyResolver {
  forTenant(tenantId: string): JWTVerifyGetKey;
}

export interface RemoteSigningKeyResolverOptions {
  authorityHost: string;
  timeoutMs: number;
  maxTenants?: number;
  /** Tenants whose key sets are never evicted, such as authorized ones. */
  retain?: (tenantId: string) => boolean;
}

/**
 * One remote key set per tenant, fetched from the tenant's discovery
 * endpoint. jose caches the keys and rate-limits refetches on unknown `kid`s.
 * Beyond `maxTenants`, the least recently used unretained key set goes first.
 */
export class RemoteSigningKeyResolver implements SigningKeyResolver {
  private readonly authorityHost: string;
  private readonly timeoutMs: number;
  private readonly maxTenants: number;
  private readonly retain: (tenantId: string) => boolean;
  private readonly keySets = new Map<string, JWTVerifyGetKey>();

  constructor(options: RemoteSigningKeyResolverOptions) {
    this.authorityHost = options.authorityHost.replace(/\/+$/u, "");
    this.timeoutMs = options.timeoutMs;
    this.maxTenants = options.maxTenants ?? 256;
    this.retain = options.retain ?? (() => false);
  }

  jwksUri(tenantId: string) {
    return `${this.authorityHost}/${encodeURIComponent(tenantId)}/discovery/v2.0/keys`;
  }

  forTenant(tenantId: string): JWTVerifyGetKey {
    const cached = this.keySets.get(tenantId);
    if (cached) {
      this.keySets.delete(tenantId);
      this.keySets.set(tenantId, cached);
      return cached;
    }

    const keySet = createRemoteJWKSet(new URL(this.jwksUri(tenantId)), {
      timeoutDuration: this.timeoutMs
    });
    this.keySets.set(tenantId, keySet);
    this.evict();

    return keySet;
  }

  private evict() {
    for (const tenantId of this.keySets.keys()) {
      if (this.keySets.size <= this.maxTenants) {
        return;
      }
      if (!this.retain(tenantId)) {
        this.keySets.delete(tenantId);
      }
    }
  }
}
