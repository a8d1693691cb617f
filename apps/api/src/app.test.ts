import {
  createFactory,
  createFetchFixture,
  createTestSigningAuthority,
  fixedClock,
  type FetchFixture,
  type FetchHandler,
  type FetchResponseFixture,
  type TestSigningAuthority
} from "@idbroker/testkit";
import type { FastifyInstance } from "fastify";
import { afterEach, beforeAll, describe, expect, it } from "vitest";
import { buildApiApp } from "./app.js";
import { loadApiConfig } from "./config/index.js";

const HOME = "11111111-1111-1111-1111-111111111111";
const CUSTOMER = "22222222-2222-2222-2222-222222222222";
const STRANGER = "33333333-3333-3333-3333-333333333333";
const AUDIENCE = "api://broker";
const MANAGEMENT = "https://management.azure.com";
const NOW = "2026-03-01T10:00:00.000Z";

const CUSTOMER_INCIDENTS_URL = `${MANAGEMENT}/subscriptions/sub-customer/resourceGroups/rg-soc/providers/Microsoft.OperationalInsights/workspaces/ws-customer/providers/Microsoft.SecurityInsights/incidents`;

const baseEnv: NodeJS.ProcessEnv = {
  LOG_LEVEL: "silent",
  AZURE_HOME_TENANT_ID: HOME,
  AZURE_CLIENT_ID: "broker-client-id",
  AZURE_CLIENT_SECRET: "test-secret",
  AUTH_AUDIENCE: AUDIENCE,
  MULTI_TENANT_ENABLED: "true",
  ENABLE_AUTO_TENANT_DISCOVERY: "true",
  TENANTS_JSON: JSON.stringify([
    {
      tenantId: CUSTOMER,
      displayName: "Contoso",
      workspace: {
        subscriptionId: "sub-customer",
        resourceGroup: "rg-soc",
        workspaceName: "ws-customer"
      }
    }
  ])
};

function buildIncidentRow() {
  return createFactory((sequence) => ({
    name: `incident-guid-${sequence}`,
    properties: {
      incidentNumber: sequence,
      title: `Incident ${sequence}`,
      severity: "Medium",
      status: "New",
      createdTimeUtc: NOW
    }
  }));
}

function tokenPath(tenantId: string) {
  return `/${tenantId}/oauth2/v2.0/token`;
}

// Issues `obo:<tenant>` for every on-behalf-of request the fixture sees.
const oboIssuer: FetchHandler = (call) => {
  const tenantId = new URL(call.url).pathname.split("/")[1] ?? "";
  return { body: { access_token: `obo:${tenantId}`, expires_in: 3_600 } };
};

let authority: TestSigningAuthority;
const openApps: FastifyInstance[] = [];

beforeAll(async () => {
  authority = await createTestSigningAuthority();
});

afterEach(async () => {
  await Promise.all(openApps.splice(0).map((app) => app.close()));
});

async function buildTestApp(
  options: {
    env?: NodeJS.ProcessEnv;
    routes?: Record<string, FetchResponseFixture | FetchHandler>;
  } = {}
): Promise<{ app: FastifyInstance; fixture: FetchFixture }> {
  const incidentRow = buildIncidentRow();
  const fixture = createFetchFixture({
    [`POST ${tokenPath(HOME)}`]: oboIssuer,
    [`POST ${tokenPath(CUSTOMER)}`]: oboIssuer,
    [`POST ${tokenPath(STRANGER)}`]: oboIssuer,
    [`GET ${CUSTOMER_INCIDENTS_URL}`]: { body: { value: [incidentRow(), incidentRow()] } },
    ...options.routes
  });
  const { app } = await buildApiApp({
    config: loadApiConfig({ ...baseEnv, ...options.env }),
    now: fixedClock(NOW),
    fetch: fixture.fetch,
    signingKeys: authority
  });
  openApps.push(app);
  return { app, fixture };
}

function bearer(tenantId: string, options: { roles?: string[] } = {}) {
  return authority
    .signAccessToken({
      tenantId,
      audience: AUDIENCE,
      issuedAt: new Date(NOW),
      scopes: ["access_as_user"],
      roles: options.roles
    })
    .then((token) => `Bearer ${token}`);
}

describe("API app", () => {
  it("returns health status", async () => {
    const { app } = await buildTestApp();

    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok", timestamp: NOW, version: "0.1.0" });
  });

  it("returns JSON for unknown routes", async () => {
    const { app } = await buildTestApp();

    const response = await app.inject({ method: "GET", url: "/does-not-exist" });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({ code: "not_found", message: "Route not found" });
  });

  it("rejects requests without a bearer token", async () => {
    const { app } = await buildTestApp();

    const response = await app.inject({ method: "GET", url: "/v1/auth/status" });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({
      code: "invalid_token",
      message: "Missing Authorization header",
      requestId: expect.any(String)
    });
  });

  it("describes the authenticated caller", async () => {
    const { app } = await buildTestApp();

    const response = await app.inject({
      method: "GET",
      url: "/v1/auth/status",
      headers: { authorization: await bearer(HOME) }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      authenticated: true,
      principal: {
        subjectId: "user-object-id",
        tenantId: HOME,
        name: "Test Analyst",
        preferredUsername: "analyst@example.test",
        scopes: ["access_as_user"],
        roles: [],
        expiresAt: "2026-03-01T11:00:00.000Z"
      },
      tenant: {
        tenantId: HOME,
        displayName: "Home tenant",
        role: "home",
        status: "authorized",
        source: "config",
        enabled: true,
        workspaceConfigured: false,
        updatedAt: NOW
      },
      multiTenantEnabled: true,
      autoDiscoveryEnabled: true
    });
  });

  it("lists a delegated tenant's incidents with a token exchanged on the caller's behalf", async () => {
    const { app, fixture } = await buildTestApp();
    const authorization = await bearer(HOME);

    const response = await app.inject({
      method: "GET",
      url: `/v1/tenants/${CUSTOMER}/incidents?severity=medium&limit=10`,
      headers: { authorization }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      tenantId: CUSTOMER,
      attribution: "user",
      count: 2,
      incidents: [
        {
          id: "incident-guid-1",
          number: 1,
          title: "Incident 1",
          severity: "Medium",
          status: "New",
          createdAt: NOW
        },
        {
          id: "incident-guid-2",
          number: 2,
          title: "Incident 2",
          severity: "Medium",
          status: "New",
          createdAt: NOW
        }
      ]
    });

    const [exchange] = fixture.callsTo(tokenPath(CUSTOMER));
    expect(exchange?.form).toMatchObject({
      grant_type: "urn:ietf:params:oauth:grant-type:jwt-bearer",
      requested_token_use: "on_behalf_of",
      assertion: authorization.slice("Bearer ".length),
      scope: `${MANAGEMENT}/.default`
    });
    const [sentinelCall] = fixture.callsTo(CUSTOMER_INCIDENTS_URL);
    expect(sentinelCall?.headers.authorization).toBe(`Bearer obo:${CUSTOMER}`);
    expect(new URL(sentinelCall?.url ?? "").searchParams.get("$top")).toBe("10");
  });

  it("reuses the exchanged token across requests from the same caller", async () => {
    const { app, fixture } = await buildTestApp();
    const authorization = await bearer(HOME);

    for (let attempt = 0; attempt < 3; attempt += 1) {
      const response = await app.inject({
        method: "GET",
        url: `/v1/tenants/${CUSTOMER}/incidents`,
        headers: { authorization }
      });
      expect(response.statusCode).toBe(200);
    }

    expect(fixture.callsTo(tokenPath(CUSTOMER))).toHaveLength(1);
    expect(fixture.callsTo(CUSTOMER_INCIDENTS_URL)).toHaveLength(3);
  });

  it("rejects incident reads for tenants outside the allow-list", async () => {
    const { app, fixture } = await buildTestApp();

    const response = await app.inject({
      method: "GET",
      url: `/v1/tenants/${STRANGER}/incidents`,
      headers: { authorization: await bearer(HOME) }
    });

    expect(response.statusCode).toBe(403);
    expect(response.json()).toMatchObject({
      code: "unauthorized_tenant",
      message: `Tenant ${STRANGER} is not authorized for this service`
    });
    expect(fixture.calls).toHaveLength(0);
  });

  it("fails a user data read when the exchange fails instead of using the service identity", async () => {
    const { app, fixture } = await buildTestApp({
      routes: {
        [`POST ${tokenPath(CUSTOMER)}`]: {
          status: 400,
          body: { error: "invalid_grant", error_description: "AADSTS50013: assertion rejected" }
        }
      }
    });

    const response = await app.inject({
      method: "GET",
      url: `/v1/tenants/${CUSTOMER}/incidents`,
      headers: { authorization: await bearer(HOME) }
    });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toMatchObject({ code: "obo_exchange_failed" });
    expect(fixture.callsTo(tokenPath(CUSTOMER)).map((call) => call.form?.grant_type)).toEqual([
      "urn:ietf:params:oauth:grant-type:jwt-bearer"
    ]);
    expect(fixture.callsTo(CUSTOMER_INCIDENTS_URL)).toHaveLength(0);
  });

  it("returns 404 for a tenant without a configured workspace", async () => {
    const { app } = await buildTestApp();

    const response = await app.inject({
      method: "GET",
      url: `/v1/tenants/${HOME}/incidents`,
      headers: { authorization: await bearer(HOME) }
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({
      code: "not_found",
      message: `No Sentinel workspace is configured for tenant ${HOME}`
    });
  });

  it("rejects invalid query parameters", async () => {
    const { app } = await buildTestApp();

    const response = await app.inject({
      method: "GET",
      url: `/v1/tenants/${CUSTOMER}/incidents?limit=0`,
      headers: { authorization: await bearer(HOME) }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ code: "invalid_request" });
  });

  it("authorizes a discovered tenant only after a successful delegated exchange", async () => {
    const { app } = await buildTestApp();
    const strangerAuthorization = await bearer(STRANGER);

    const rejected = await app.inject({
      method: "GET",
      url: "/v1/auth/status",
      headers: { authorization: strangerAuthorization }
    });
    expect(rejected.statusCode).toBe(403);
    expect(rejected.json()).toMatchObject({ code: "unauthorized_tenant" });

    const listed = await app.inject({
      method: "GET",
      url: "/v1/tenants",
      headers: { authorization: await bearer(HOME) }
    });
    expect(listed.json()).toMatchObject({
      count: 3,
      tenants: [
        { tenantId: HOME, status: "authorized" },
        { tenantId: CUSTOMER, status: "authorized" },
        { tenantId: STRANGER, status: "pending_evidence", source: "discovered" }
      ]
    });

    const probe = await app.inject({
      method: "POST",
      url: `/v1/tenants/${STRANGER}/probe`,
      headers: { authorization: await bearer(HOME) }
    });
    expect(probe.statusCode).toBe(200);
    expect(probe.json()).toMatchObject({
      tenant: { tenantId: STRANGER, status: "authorized", source: "discovered" }
    });

    const accepted = await app.inject({
      method: "GET",
      url: "/v1/auth/status",
      headers: { authorization: strangerAuthorization }
    });
    expect(accepted.statusCode).toBe(200);
    expect(accepted.json()).toMatchObject({ principal: { tenantId: STRANGER } });
  });

  it("keeps unknown tenants out when discovery is off", async () => {
    const { app, fixture } = await buildTestApp({ env: { ENABLE_AUTO_TENANT_DISCOVERY: "false" } });

    const probe = await app.inject({
      method: "POST",
      url: `/v1/tenants/${STRANGER}/probe`,
      headers: { authorization: await bearer(HOME) }
    });

    expect(probe.statusCode).toBe(403);
    expect(probe.json()).toMatchObject({ code: "unauthorized_tenant" });
    expect(fixture.calls).toHaveLength(0);
  });

  it("limits tenant cache flushes to administrators", async () => {
    const { app } = await buildTestApp();
    await app.inject({
      method: "GET",
      url: `/v1/tenants/${CUSTOMER}/incidents`,
      headers: { authorization: await bearer(HOME) }
    });

    const forbidden = await app.inject({
      method: "POST",
      url: `/v1/tenants/${CUSTOMER}/cache/flush`,
      headers: { authorization: await bearer(HOME) }
    });
    expect(forbidden.statusCode).toBe(403);
    expect(forbidden.json()).toMatchObject({
      code: "permission_denied",
      message: "Missing required role: Broker.Admin"
    });

    const flushed = await app.inject({
      method: "POST",
      url: `/v1/tenants/${CUSTOMER}/cache/flush`,
      headers: { authorization: await bearer(HOME, { roles: ["Broker.Admin"] }) }
    });
    expect(flushed.statusCode).toBe(200);
    expect(flushed.json()).toEqual({ tenantId: CUSTOMER, flushed: 1 });
  });
});
