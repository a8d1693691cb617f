import type { IssuedToken } from "./types.js";

export interface TokenCacheKey {
  tenantId: string;
  resource: string;
  /** sha256 of the user assertion, or `system` for the system identity. */
  assertionFingerprint: string;
}

export interface TokenCacheOptions {
  safetyMarginSeconds: number;
  maxEntries?: number;
  now?: () => Date;
}

interface CacheEntry {
  key: TokenCacheKey;
  token: IssuedToken;
}

function serializeKey(key: TokenCacheKey) {
  return JSON.stringify([key.tenantId, key.resource, key.assertionFingerprint]);
}

/**
 * Process-wide store of issued tokens. At most one fetch runs per key;
 * concurrent callers share its promise. Expired entries are dropped when they
 * are looked up, never by a background sweep.
 */
export class TokenCache {
  private readonly safetyMarginMs: number;
  private readonly maxEntries: number;
  private readonly now: () => Date;
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inflight = new Map<string, Promise<IssuedToken>>();
  private readonly tenantGenerations = new Map<string, number>();
  private generation = 0;

  constructor(options: TokenCacheOptions) {
    this.safetyMarginMs = options.safetyMarginSeconds * 1000;
    this.maxEntries = options.maxEntries ?? 5_000;
    this.now = options.now ?? (() => new Date());
  }

  isUsable(token: IssuedToken) {
    return this.now().getTime() < token.expiresAt.getTime() - this.safetyMarginMs;
  }

  peek(key: TokenCacheKey): IssuedToken | null {
    const cacheKey = serializeKey(key);
    const entry = this.entries.get(cacheKey);
    if (!entry) {
      return null;
    }

    if (!this.isUsable(entry.token)) {
      this.entries.delete(cacheKey);
      return null;
    }

    return entry.token;
  }

  getOrFetch(key: TokenCacheKey, fetchToken: () => Promise<IssuedToken>): Promise<IssuedToken> {
    const cached = this.peek(key);
    if (cached) {
      return Promise.resolve(cached);
    }

    const cacheKey = serializeKey(key);
    const pending = this.inflight.get(cacheKey);
    if (pending) {
      return pending;
    }

    const startedIn = this.generation;
    const tenantStartedIn = this.tenantGeneration(key.tenantId);
    const request = new Promise<IssuedToken>((resolve) => resolve(fetchToken()))
      .then((token) => {
        // A token already inside the safety margin goes back to the caller
        // but is not stored; the next request fetches again.
        if (
          this.isUsable(token) &&
          startedIn === this.generation &&
          tenantStartedIn === this.tenantGeneration(key.tenantId)
        ) {
          this.store(cacheKey, { key, token });
        }
        return token;
      })
      .finally(() => {
        this.inflight.delete(cacheKey);
      });

    this.inflight.set(cacheKey, request);
    return request;
  }

  /** Drops one tenant's entries. Its fetches in flight still resolve but are not stored. */
  flushTenant(tenantId: string): number {
    this.tenantGenerations.set(tenantId, this.tenantGeneration(tenantId) + 1);
    let removed = 0;
    for (const [cacheKey, entry] of this.entries) {
      if (entry.key.tenantId === tenantId) {
        this.entries.delete(cacheKey);
        removed += 1;
      }
    }
    return removed;
  }

  /** Drops every entry. Fetches in flight still resolve but are not stored. */
  flush(): number {
    const removed = this.entries.size;
    this.entries.clear();
    this.generation += 1;
    return removed;
  }

  size() {
    return this.entries.size;
  }

  private tenantGeneration(tenantId: string) {
    return this.tenantGenerations.get(tenantId) ?? 0;
  }

  private store(cacheKey: string, entry: CacheEntry) {
    this.entries.delete(cacheKey);
    this.entries.set(cacheKey, entry);

    if (this.entries.size <= this.maxEntries) {
      return;
    }

    for (const [staleKey, staleEntry] of this.entries) {
      if (!this.isUsable(staleEntry.token)) {
        this.entries.delete(staleKey);
      }
    }

    while (this.entries.size > this.maxEntries) {
      const oldestKey = this.entries.keys().next().value;
      if (typeof oldestKey !== "string") {
        return;
      }
      this.entries.delete(oldestKey);
    }
  }
}
