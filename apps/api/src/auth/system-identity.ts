import {
  AuthenticationError,
  ClientSecretCredential,
  ManagedIdentityCredential,
  type AccessToken,
  type TokenCredential
} from "@azure/identity";
import type { ApiConfig } from "../config/index.js";
import { classifyTokenError, toScope, TokenRequestError } from "./identity-provider.js";
import type { IssuedToken } from "./types.js";

export type SystemIdentityKind = "managed_identity" | "client_credentials";

/**
 * The service's own identity. Used for configuration bootstrap and as the
 * single fallback when a bootstrap exchange on behalf of a user fails.
 */
export interface SystemIdentity {
  readonly kind: SystemIdentityKind;
  acquire(input: { tenantId: string; resource: string }): Promise<IssuedToken>;
}

export interface AzureSystemIdentityOptions {
  kind: SystemIdentityKind;
  credential: TokenCredential;
  timeoutMs: number;
}

/**
 * A system identity backed by an `@azure/identity` credential.
 *
 * A managed identity lives in the home tenant; delegated subscriptions accept
 * it through the delegation itself, so the requested tenant is not passed on.
 * The app registration's client credentials are requested in the target tenant.
 */
export class AzureSystemIdentity implements SystemIdentity {
  readonly kind: SystemIdentityKind;
  private readonly credential: TokenCredential;
  private readonly timeoutMs: number;

  constructor(options: AzureSystemIdentityOptions) {
    this.kind = options.kind;
    this.credential = options.credential;
    this.timeoutMs = options.timeoutMs;
  }

  async acquire(input: { tenantId: string; resource: string }): Promise<IssuedToken> {
    const abortSignal = AbortSignal.timeout(this.timeoutMs);
    let token: AccessToken | null;
    try {
      token = await this.credential.getToken(
        toScope(input.resource),
        this.kind === "client_credentials"
          ? { tenantId: input.tenantId, abortSignal }
          : { abortSignal }
      );
    } catch (error) {
      throw this.toRequestError(input.tenantId, error);
    }

    if (!token) {
      throw new TokenRequestError({
        reason: "rejected",
        tenantId: input.tenantId,
        message: `System identity (${this.kind}) returned no token for tenant ${input.tenantId}`
      });
    }

    return {
      accessToken: token.token,
      expiresAt: new Date(token.expiresOnTimestamp)
    };
  }

  private toRequestError(tenantId: string, error: unknown) {
    if (error instanceof AuthenticationError) {
      const providerCode = error.errorResponse.error || null;
      return new TokenRequestError({
        reason: classifyTokenError({
          status: error.statusCode,
          error: providerCode,
          description: error.errorResponse.errorDescription || null
        }),
        tenantId,
        providerCode,
        status: error.statusCode,
        message: `System identity (${this.kind}) was rejected for tenant ${tenantId} (${error.statusCode})`,
        cause: error
      });
    }

    // Unavailable credentials, timeouts and transport failures.
    return new TokenRequestError({
      reason: "network",
      tenantId,
      message: `System identity (${this.kind}) is unavailable for tenant ${tenantId}`,
      cause: error
    });
  }
}

type SystemIdentityConfig = Pick<
  ApiConfig,
  | "systemIdentityMode"
  | "identityEndpoint"
  | "identityHeader"
  | "managedIdentityClientId"
  | "homeTenantId"
  | "clientId"
  | "clientSecret"
  | "authorityHost"
  | "httpTimeoutMs"
>;

export function createAzureCredential(
  kind: SystemIdentityKind,
  config: SystemIdentityConfig
): TokenCredential {
  if (kind === "managed_identity") {
    return new ManagedIdentityCredential({ clientId: config.managedIdentityClientId });
  }

  return new ClientSecretCredential(config.homeTenantId, config.clientId, config.clientSecret, {
    authorityHost: config.authorityHost,
    additionallyAllowedTenants: ["*"]
  });
}

export function buildSystemIdentity(
  config: SystemIdentityConfig,
  deps: { createCredential?: (kind: SystemIdentityKind) => TokenCredential } = {}
): SystemIdentity {
  const kind =
    config.systemIdentityMode ??
    (config.identityEndpoint && config.identityHeader ? "managed_identity" : "client_credentials");
  const createCredential =
    deps.createCredential ?? ((selected: SystemIdentityKind) => createAzureCredential(selected, config));

  return new AzureSystemIdentity({
    kind,
    credential: createCredential(kind),
    timeoutMs: config.httpTimeoutMs
  });
}
