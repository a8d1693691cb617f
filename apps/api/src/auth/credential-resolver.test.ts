import { createDeferred, createRecordingLogger, manualClock } from "@idbroker/testkit";
import { describe, expect, it, vi } from "vitest";
import type { ConfiguredTenant } from "../config/index.js";
import { FixedWindowRateLimiter } from "../lib/rate-limiter.js";
import { CredentialResolver } from "./credential-resolver.js";
import { BrokerError, OboExchangeError } from "./errors.js";
import { TokenRequestError, type TokenEndpointClient } from "./identity-provider.js";
import type { SystemIdentity } from "./system-identity.js";
import { TenantRegistry } from "./tenant-registry.js";
import { TokenCache } from "./token-cache.js";
import type { IssuedToken, VerifiedPrincipal } from "./types.js";

const HOME = "11111111-1111-1111-1111-111111111111";
const CUSTOMER = "22222222-2222-2222-2222-222222222222";
const STRANGER = "33333333-3333-3333-3333-333333333333";
const MANAGEMENT = "https://management.azure.com";

type ExchangeInput = Parameters<TokenEndpointClient["exchangeOnBehalfOf"]>[0];

function principalFor(tenantId: string, token = "inbound-token-1"): VerifiedPrincipal {
  return {
    subjectId: "user-object-id",
    tenantId,
    issuer: `https://login.microsoftonline.com/${tenantId}/v2.0`,
    audience: ["api://broker"],
    scopes: new Set(["access_as_user"]),
    roles: new Set(),
    name: "Test Analyst",
    preferredUsername: "analyst@example.test",
    expiresAt: new Date("2026-03-01T11:00:00.000Z"),
    token,
    rawClaims: {}
  };
}

function issued(accessToken: string, expiresAt = "2026-03-01T11:00:00.000Z"): IssuedToken {
  return { accessToken, expiresAt: new Date(expiresAt) };
}

function buildResolver(
  options: {
    tenants?: ConfiguredTenant[];
    autoDiscoveryEnabled?: boolean;
    exchange?: (input: ExchangeInput) => Promise<IssuedToken>;
    systemAcquire?: SystemIdentity["acquire"];
  } = {}
) {
  const clock = manualClock("2026-03-01T10:00:00.000Z");
  const logger = createRecordingLogger();
  const registry = new TenantRegistry({
    homeTenantId: HOME,
    multiTenantEnabled: true,
    autoDiscoveryEnabled: options.autoDiscoveryEnabled ?? false,
    tenants: options.tenants ?? [{ tenantId: CUSTOMER, enabled: true }],
    discoveryLimiter: new FixedWindowRateLimiter({ windowMs: 3_600_000, maxEvents: 10 }),
    logger,
    now: clock.now
  });
  const exchangeOnBehalfOf = vi.fn(
    options.exchange ?? (async (input: ExchangeInput) => issued(`obo:${input.tenantId}:${input.scope}`))
  );
  const tokenClient: TokenEndpointClient = { exchangeOnBehalfOf };
  const systemAcquire = vi.fn(
    options.systemAcquire ??
      (async (input: { tenantId: string; resource: string }) => issued(`system:${input.tenantId}`))
  );
  const systemIdentity: SystemIdentity = { kind: "client_credentials", acquire: systemAcquire };
  const cache = new TokenCache({ safetyMarginSeconds: 300, now: clock.now });

  const resolver = new CredentialResolver({
    tokenClient,
    systemIdentity,
    cache,
    registry,
    logger,
    now: clock.now
  });

  return { resolver, registry, cache, clock, logger, exchangeOnBehalfOf, systemAcquire };
}

function rejection(reason: TokenRequestError["reason"], tenantId = CUSTOMER) {
  return new TokenRequestError({ reason, tenantId, message: `token request ${reason}` });
}

describe("CredentialResolver", () => {
  it("exchanges the caller's token in the target tenant for the resource", async () => {
    const { resolver, exchangeOnBehalfOf } = buildResolver();

    const credential = await resolver.resolve({
      resource: `${MANAGEMENT}/`,
      tenantId: CUSTOMER,
      principal: principalFor(HOME)
    });

    expect(credential.context).toEqual({
      strategy: "obo",
      attribution: "user",
      tenantId: CUSTOMER,
      resource: MANAGEMENT
    });
    expect(credential.authorizationHeader()).toBe(
      `Bearer obo:${CUSTOMER}:${MANAGEMENT}/.default`
    );
    expect(exchangeOnBehalfOf).toHaveBeenCalledWith({
      tenantId: CUSTOMER,
      assertion: "inbound-token-1",
      scope: `${MANAGEMENT}/.default`
    });
  });

  it("serializes a credential without its token", async () => {
    const { resolver } = buildResolver();

    const credential = await resolver.resolve({ resource: MANAGEMENT, principal: principalFor(HOME) });

    expect(JSON.parse(JSON.stringify(credential))).toEqual({
      strategy: "obo",
      attribution: "user",
      tenantId: HOME,
      resource: MANAGEMENT,
      expiresAt: "2026-03-01T11:00:00.000Z"
    });
  });

  it("reuses a cached exchange for the same caller token, tenant and resource", async () => {
    const { resolver, exchangeOnBehalfOf } = buildResolver();
    const principal = principalFor(HOME);

    await resolver.resolve({ resource: MANAGEMENT, tenantId: CUSTOMER, principal });
    await resolver.resolve({ resource: `${MANAGEMENT}/.default`, tenantId: CUSTOMER, principal });

    expect(exchangeOnBehalfOf).toHaveBeenCalledTimes(1);
  });

  it("does not share exchanges between different caller tokens", async () => {
    const { resolver, exchangeOnBehalfOf } = buildResolver();

    await resolver.resolve({ resource: MANAGEMENT, principal: principalFor(HOME, "inbound-token-1") });
    await resolver.resolve({ resource: MANAGEMENT, principal: principalFor(HOME, "inbound-token-2") });

    expect(exchangeOnBehalfOf).toHaveBeenCalledTimes(2);
  });

  it("performs a single exchange for concurrent resolutions of the same key", async () => {
    const pending = createDeferred<IssuedToken>();
    const { resolver, exchangeOnBehalfOf } = buildResolver({ exchange: () => pending.promise });
    const principal = principalFor(HOME);

    const resolutions = Array.from({ length: 5 }, () =>
      resolver.resolve({ resource: MANAGEMENT, tenantId: CUSTOMER, principal })
    );
    pending.resolve(issued("shared-token"));
    const credentials = await Promise.all(resolutions);

    expect(exchangeOnBehalfOf).toHaveBeenCalledTimes(1);
    expect(new Set(credentials.map((credential) => credential.authorizationHeader()))).toEqual(
      new Set(["Bearer shared-token"])
    );
  });

  it("fails user data requests without ever using the system identity", async () => {
    const { resolver, systemAcquire } = buildResolver({
      exchange: async () => {
        throw rejection("rejected");
      }
    });

    const outcome = await resolver.resolveOutcome({
      resource: MANAGEMENT,
      tenantId: CUSTOMER,
      principal: principalFor(HOME)
    });

    expect(outcome.kind).toBe("obo_failed");
    if (outcome.kind !== "obo_failed") {
      return;
    }
    expect(outcome.error).toBeInstanceOf(OboExchangeError);
    expect(outcome.error).toMatchObject({
      statusCode: 502,
      code: "obo_exchange_failed",
      reason: "rejected",
      tenantId: CUSTOMER,
      resource: MANAGEMENT
    });
    expect(systemAcquire).not.toHaveBeenCalled();
  });

  it("surfaces consent failures as forbidden", async () => {
    const { resolver } = buildResolver({
      exchange: async () => {
        throw rejection("consent_required");
      }
    });

    await expect(
      resolver.resolve({ resource: MANAGEMENT, tenantId: CUSTOMER, principal: principalFor(HOME) })
    ).rejects.toMatchObject({ statusCode: 403, code: "obo_exchange_failed" });
  });

  it("falls back to the system identity for bootstrap requests only", async () => {
    const { resolver, systemAcquire, logger } = buildResolver({
      exchange: async () => {
        throw rejection("network");
      }
    });

    const outcome = await resolver.resolveOutcome({
      resource: MANAGEMENT,
      tenantId: CUSTOMER,
      principal: principalFor(HOME),
      purpose: "bootstrap"
    });

    expect(outcome.kind).toBe("obo_failed_fallback_used");
    if (outcome.kind !== "obo_failed_fallback_used") {
      return;
    }
    expect(outcome.failure.reason).toBe("network");
    expect(outcome.credential.context).toEqual({
      strategy: "fallback_identity",
      attribution: "system",
      tenantId: CUSTOMER,
      resource: MANAGEMENT
    });
    expect(systemAcquire).toHaveBeenCalledTimes(1);
    expect(logger.messages("warn")).toContain("Bootstrap request fell back to the system identity");
  });

  it("reports an unavailable system identity when the fallback also fails", async () => {
    const { resolver } = buildResolver({
      exchange: async () => {
        throw rejection("network");
      },
      systemAcquire: async () => {
        throw rejection("network");
      }
    });

    const outcome = await resolver.resolveOutcome({
      resource: MANAGEMENT,
      tenantId: CUSTOMER,
      principal: principalFor(HOME),
      purpose: "bootstrap"
    });

    expect(outcome.kind).toBe("obo_failed");
    if (outcome.kind !== "obo_failed") {
      return;
    }
    expect(outcome.error).toMatchObject({ statusCode: 503, code: "system_identity_unavailable" });
  });

  it("uses the system identity when there is no caller", async () => {
    const { resolver, exchangeOnBehalfOf } = buildResolver();

    const outcome = await resolver.resolveOutcome({ resource: MANAGEMENT, tenantId: CUSTOMER });

    expect(outcome.kind).toBe("system_identity");
    if (outcome.kind !== "system_identity") {
      return;
    }
    expect(outcome.credential.context.attribution).toBe("system");
    expect(outcome.credential.authorizationHeader()).toBe(`Bearer system:${CUSTOMER}`);
    expect(exchangeOnBehalfOf).not.toHaveBeenCalled();
  });

  it("rejects tenants outside the allow-list without contacting the provider", async () => {
    const { resolver, exchangeOnBehalfOf } = buildResolver();

    const error = await resolver
      .resolve({ resource: MANAGEMENT, tenantId: STRANGER, principal: principalFor(HOME) })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BrokerError);
    expect(error).toMatchObject({
      statusCode: 403,
      code: "unauthorized_tenant",
      message: `Tenant ${STRANGER} is not authorized for this service`
    });
    expect(exchangeOnBehalfOf).not.toHaveBeenCalled();
  });

  it("rejects callers whose own tenant is not authorized", async () => {
    const { resolver } = buildResolver();

    await expect(
      resolver.resolve({ resource: MANAGEMENT, tenantId: HOME, principal: principalFor(STRANGER) })
    ).rejects.toMatchObject({ code: "unauthorized_tenant" });
  });

  it("authorizes a discovered tenant after a successful delegated exchange", async () => {
    const { resolver, registry } = buildResolver({ tenants: [], autoDiscoveryEnabled: true });
    await registry.observe(STRANGER);

    const credential = await resolver.resolve({
      resource: MANAGEMENT,
      tenantId: STRANGER,
      principal: principalFor(HOME)
    });

    expect(credential.context.tenantId).toBe(STRANGER);
    expect(registry.isAuthorized(STRANGER)).toBe(true);
    expect(registry.get(STRANGER)?.evidence).toEqual({
      resource: MANAGEMENT,
      sourceTenantId: HOME,
      subjectFingerprint: expect.stringMatching(/^[0-9a-f]{16}$/u),
      observedAt: "2026-03-01T10:00:00.000Z"
    });
  });

  it("keeps a discovered tenant unauthorized when the probe exchange fails", async () => {
    const { resolver, registry } = buildResolver({
      tenants: [],
      autoDiscoveryEnabled: true,
      exchange: async () => {
        throw rejection("tenant_mismatch", STRANGER);
      }
    });

    await expect(
      resolver.resolve({ resource: MANAGEMENT, tenantId: STRANGER, principal: principalFor(HOME) })
    ).rejects.toMatchObject({ code: "unauthorized_tenant" });
    expect(registry.isAuthorized(STRANGER)).toBe(false);
  });
});
