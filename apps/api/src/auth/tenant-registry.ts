import type { ConfiguredTenant } from "../config/index.js";
import type { Queryable } from "../lib/db.js";
import type { LoggerLike } from "../lib/logger.js";
import type { FixedWindowRateLimiter } from "../lib/rate-limiter.js";
import type {
  DelegationEvidence,
  SentinelWorkspace,
  TenantAccess,
  TenantRecord,
  TenantSource,
  TenantStatus
} from "./types.js";

export interface TenantStore {
  load(): Promise<TenantRecord[]>;
  save(record: TenantRecord): Promise<void>;
}

export class MemoryTenantStore implements TenantStore {
  private readonly records = new Map<string, TenantRecord>();

  async load(): Promise<TenantRecord[]> {
    return [...this.records.values()].map((record) => ({ ...record }));
  }

  async save(record: TenantRecord): Promise<void> {
    this.records.set(record.tenantId, { ...record });
  }
}

type TenantRow = {
  tenant_id: string;
  display_name: string;
  role: string;
  status: string;
  source: string;
  enabled: boolean;
  workspace: SentinelWorkspace | null;
  evidence: DelegationEvidence | null;
  created_at: Date | string;
  updated_at: Date | string;
};

function toIso(value: Date | string) {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

function rowToRecord(row: TenantRow): TenantRecord | null {
  const role = row.role === "home" || row.role === "delegated" ? row.role : null;
  const status =
    row.status === "authorized" || row.status === "pending_evidence" ? row.status : null;
  const source =
    row.source === "config" || row.source === "registered" || row.source === "discovered"
      ? row.source
      : null;
  if (!role || !status || !source) {
    return null;
  }

  return {
    tenantId: row.tenant_id,
    displayName: row.display_name,
    role,
    status,
    source,
    enabled: row.enabled,
    workspace: row.workspace,
    evidence: row.evidence,
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at)
  };
}

/**
 * Tenant records in PostgreSQL. Writes are upserts keyed by tenant id, so
 * concurrent writers resolve to the last write.
 */
export class PostgresTenantStore implements TenantStore {
  private readonly db: Queryable;

  constructor(db: Queryable) {
    this.db = db;
  }

  async ensureSchema(): Promise<void> {
    await this.db.query(`
      create table if not exists broker_tenants (
        tenant_id text primary key,
        display_name text not null,
        role text not null,
        status text not null,
        source text not null,
        enabled boolean not null default true,
        workspace jsonb,
        evidence jsonb,
        created_at timestamptz not null,
        updated_at timestamptz not null
      )
    `);
  }

  async load(): Promise<TenantRecord[]> {
    await this.ensureSchema();
    const result = await this.db.query<TenantRow>(
      `
        select tenant_id, display_name, role, status, source, enabled,
               workspace, evidence, created_at, updated_at
        from broker_tenants
        order by tenant_id
      `
    );

    return result.rows.flatMap((row) => {
      const record = rowToRecord(row);
      return record ? [record] : [];
    });
  }

  async save(record: TenantRecord): Promise<void> {
    await this.db.query(
      `
        insert into broker_tenants (
          tenant_id, display_name, role, status, source, enabled,
          workspace, evidence, created_at, updated_at
        )
        values ($1, $2, $3, $4, $5, $6, $7::jsonb, $8::jsonb, $9, $10)
        on conflict (tenant_id) do update set
          display_name = excluded.display_name,
          role = excluded.role,
          status = excluded.status,
          source = excluded.source,
          enabled = excluded.enabled,
          workspace = excluded.workspace,
          evidence = excluded.evidence,
          updated_at = excluded.updated_at
      `,
      [
        record.tenantId,
        record.displayName,
        record.role,
        record.status,
        record.source,
        record.enabled,
        record.workspace ? JSON.stringify(record.workspace) : null,
        record.evidence ? JSON.stringify(record.evidence) : null,
        record.createdAt,
        record.updatedAt
      ]
    );
  }
}

export type ObservationResult = "recorded" | "known" | "rate_limited" | "discovery_disabled";

export interface TenantRegistryOptions {
  homeTenantId: string;
  multiTenantEnabled: boolean;
  autoDiscoveryEnabled: boolean;
  tenants: ConfiguredTenant[];
  discoveryLimiter: FixedWindowRateLimiter;
  store?: TenantStore;
  logger: LoggerLike;
  now?: () => Date;
}

const DISCOVERY_LIMIT_KEY = "tenant-discovery";
const VERIFICATION_LIMIT_KEY = "unknown-tenant-verification";

// Allowed status moves. Records never move backwards; revocation is `disable`.
const TRANSITIONS: Record<TenantStatus | "unknown", readonly TenantStatus[]> = {
  unknown: ["pending_evidence", "authorized"],
  pending_evidence: ["authorized"],
  authorized: []
};

/**
 * The tenant allow-list. Holds the home tenant, tenants from configuration,
 * tenants registered by an administrator and tenants discovered from
 * delegation evidence.
 *
 * Discovery moves a tenant `unknown -> pending_evidence -> authorized`. Only a
 * successful resource-level delegated exchange counts as evidence; claims in an
 * inbound token never do.
 */
export class TenantRegistry {
  private readonly homeTenantId: string;
  private readonly multiTenantEnabled: boolean;
  private readonly autoDiscoveryEnabled: boolean;
  private readonly discoveryLimiter: FixedWindowRateLimiter;
  private readonly store: TenantStore;
  private readonly logger: LoggerLike;
  private readonly now: () => Date;
  private readonly records = new Map<string, TenantRecord>();

  constructor(options: TenantRegistryOptions) {
    this.homeTenantId = options.homeTenantId;
    this.multiTenantEnabled = options.multiTenantEnabled;
    this.autoDiscoveryEnabled = options.autoDiscoveryEnabled;
    this.discoveryLimiter = options.discoveryLimiter;
    this.store = options.store ?? new MemoryTenantStore();
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());

    const timestamp = this.now().toISOString();
    const homeConfig = options.tenants.find((tenant) => tenant.tenantId === this.homeTenantId);
    this.records.set(this.homeTenantId, {
      tenantId: this.homeTenantId,
      displayName: homeConfig?.displayName ?? "Home tenant",
      role: "home",
      status: "authorized",
      source: "config",
      enabled: true,
      workspace: homeConfig?.workspace ?? null,
      evidence: null,
      createdAt: timestamp,
      updatedAt: timestamp
    });

    for (const tenant of options.tenants) {
      if (tenant.tenantId === this.homeTenantId) {
        continue;
      }

      this.records.set(tenant.tenantId, {
        tenantId: tenant.tenantId,
        displayName: tenant.displayName ?? tenant.tenantId,
        role: "delegated",
        status: "authorized",
        source: "config",
        enabled: tenant.enabled,
        workspace: tenant.workspace ?? null,
        evidence: null,
        createdAt: timestamp,
        updatedAt: timestamp
      });
    }
  }

  get multiTenant() {
    return this.multiTenantEnabled;
  }

  get discoveryEnabled() {
    return this.multiTenantEnabled && this.autoDiscoveryEnabled;
  }

  get home() {
    return this.homeTenantId;
  }

  /** Loads persisted records. Configured tenants win over stored ones. */
  async hydrate(): Promise<void> {
    const stored = await this.store.load();
    for (const record of stored) {
      const existing = this.records.get(record.tenantId);
      if (existing?.source === "config") {
        continue;
      }
      this.records.set(record.tenantId, record);
    }

    this.logger.info({ tenants: this.records.size }, "Tenant registry hydrated");
  }

  get(tenantId: string): TenantRecord | null {
    const record = this.records.get(tenantId);
    return record ? { ...record } : null;
  }

  list(): TenantRecord[] {
    return [...this.records.values()]
      .map((record) => ({ ...record }))
      .sort((left, right) => {
        if (left.role !== right.role) {
          return left.role === "home" ? -1 : 1;
        }
        return left.tenantId.localeCompare(right.tenantId);
      });
  }

  access(tenantId: string): TenantAccess {
    if (tenantId === this.homeTenantId) {
      return "authorized";
    }

    const record = this.records.get(tenantId);
    if (!record) {
      return "unknown";
    }

    return record.enabled ? record.status : "disabled";
  }

  isAuthorized(tenantId: string): boolean {
    if (tenantId === this.homeTenantId) {
      return true;
    }

    if (!this.multiTenantEnabled) {
      return false;
    }

    return this.access(tenantId) === "authorized";
  }

  /**
   * Admits one signature check of a token from an unknown tenant. A check may
   * fetch that tenant's signing keys, so every attempt spends the window's
   * budget whether or not the token turns out to be valid.
   */
  admitUnknownTenantCheck(tenantId: string): boolean {
    if (!this.discoveryEnabled) {
      return false;
    }

    const decision = this.discoveryLimiter.consume(VERIFICATION_LIMIT_KEY, this.now());
    if (!decision.allowed) {
      this.logger.debug(
        { tenantId, retryAfterSeconds: decision.retryAfterSeconds },
        "Unknown tenant verification budget exhausted"
      );
    }
    return decision.allowed;
  }

  /**
   * Records a tenant seen on a cryptographically valid inbound token as
   * `pending_evidence`. New observations are rate-limited per window.
   */
  async observe(tenantId: string): Promise<ObservationResult> {
    if (!this.discoveryEnabled) {
      return "discovery_disabled";
    }

    if (this.records.has(tenantId)) {
      return "known";
    }

    const decision = this.discoveryLimiter.consume(DISCOVERY_LIMIT_KEY, this.now());
    if (!decision.allowed) {
      this.logger.warn(
        { tenantId, retryAfterSeconds: decision.retryAfterSeconds },
        "Tenant observation rate limit reached"
      );
      return "rate_limited";
    }

    await this.transition(tenantId, "pending_evidence", { source: "discovered" });
    return "recorded";
  }

  /**
   * Authorizes a tenant from delegation evidence. Returns the updated record,
   * or null when discovery is off or the tenant has been disabled.
   */
  async recordEvidence(
    tenantId: string,
    evidence: DelegationEvidence
  ): Promise<TenantRecord | null> {
    if (!this.discoveryEnabled) {
      return null;
    }

    const access = this.access(tenantId);
    if (access === "disabled") {
      return null;
    }

    if (access === "authorized") {
      return this.get(tenantId);
    }

    const record = await this.transition(tenantId, "authorized", {
      source: "discovered",
      evidence
    });
    this.logger.info(
      {
        tenantId,
        sourceTenantId: evidence.sourceTenantId,
        resource: evidence.resource,
        subject: evidence.subjectFingerprint
      },
      "Delegated tenant authorized from delegation evidence"
    );
    return record;
  }

  /** Administrative registration. Idempotent; the latest details win. */
  async register(
    tenantId: string,
    details: { displayName?: string; workspace?: SentinelWorkspace } = {}
  ): Promise<TenantRecord> {
    const existing = this.records.get(tenantId);
    const timestamp = this.now().toISOString();
    const record: TenantRecord = {
      tenantId,
      displayName: details.displayName ?? existing?.displayName ?? tenantId,
      role: tenantId === this.homeTenantId ? "home" : "delegated",
      status: "authorized",
      source: existing?.source === "config" ? "config" : "registered",
      enabled: true,
      workspace: details.workspace ?? existing?.workspace ?? null,
      evidence: existing?.evidence ?? null,
      createdAt: existing?.createdAt ?? timestamp,
      updatedAt: timestamp
    };

    await this.store.save(record);
    this.records.set(tenantId, record);
    return { ...record };
  }

  async disable(tenantId: string): Promise<boolean> {
    if (tenantId === this.homeTenantId) {
      return false;
    }

    const existing = this.records.get(tenantId);
    if (!existing) {
      return false;
    }

    const record = { ...existing, enabled: false, updatedAt: this.now().toISOString() };
    await this.store.save(record);
    this.records.set(tenantId, record);
    this.logger.warn({ tenantId }, "Tenant disabled");
    return true;
  }

  private async transition(
    tenantId: string,
    next: TenantStatus,
    details: { source: TenantSource; evidence?: DelegationEvidence }
  ): Promise<TenantRecord> {
    const existing = this.records.get(tenantId);
    const current = existing?.status ?? "unknown";
    if (!TRANSITIONS[current].includes(next)) {
      throw new Error(`Tenant ${tenantId} cannot move from ${current} to ${next}`);
    }

    const timestamp = this.now().toISOString();
    const record: TenantRecord = {
      tenantId,
      displayName: existing?.displayName ?? tenantId,
      role: "delegated",
      status: next,
      source: existing?.source ?? details.source,
      enabled: existing?.enabled ?? true,
      workspace: existing?.workspace ?? null,
      evidence: details.evidence ?? existing?.evidence ?? null,
      createdAt: existing?.createdAt ?? timestamp,
      updatedAt: timestamp
    };

    // The in-memory record only changes once the store has accepted it.
    await this.store.save(record);
    this.records.set(tenantId, record);
    this.logger.debug({ tenantId, from: current, to: next }, "Tenant status changed");
    return { ...record };
  }
}
