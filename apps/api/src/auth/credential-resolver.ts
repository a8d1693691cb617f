import { fingerprint, sha256Hex } from "../lib/hash.js";
import type { LoggerLike } from "../lib/logger.js";
import {
  BrokerError,
  OboExchangeError,
  systemIdentityUnavailable,
  unauthorizedTenant
} from "./errors.js";
import {
  normalizeResource,
  toScope,
  TokenRequestError,
  type TokenEndpointClient
} from "./identity-provider.js";
import type { SystemIdentity } from "./system-identity.js";
import type { TenantRegistry } from "./tenant-registry.js";
import type { TokenCache } from "./token-cache.js";
import type {
  CredentialContext,
  CredentialPurpose,
  IssuedToken,
  TenantAccess,
  VerifiedPrincipal
} from "./types.js";

const SYSTEM_FINGERPRINT = "system";

/**
 * A resolved credential for one (tenant, resource). The token value only
 * leaves through {@link Credential.authorizationHeader}; serializing the
 * credential yields its context.
 */
export class Credential {
  readonly context: CredentialContext;
  readonly expiresAt: Date;
  private readonly accessToken: string;

  constructor(context: CredentialContext, token: IssuedToken) {
    this.context = context;
    this.expiresAt = token.expiresAt;
    this.accessToken = token.accessToken;
  }

  authorizationHeader() {
    return `Bearer ${this.accessToken}`;
  }

  toJSON() {
    return { ...this.context, expiresAt: this.expiresAt.toISOString() };
  }
}

export type ResolutionOutcome =
  | { kind: "obo"; credential: Credential }
  | { kind: "obo_failed_fallback_used"; credential: Credential; failure: OboExchangeError }
  | { kind: "obo_failed"; error: BrokerError }
  | { kind: "system_identity"; credential: Credential };

export interface ResolveCredentialInput {
  resource: string;
  tenantId?: string;
  principal?: VerifiedPrincipal;
  purpose?: CredentialPurpose;
}

export interface CredentialResolverDependencies {
  tokenClient: TokenEndpointClient;
  systemIdentity: SystemIdentity;
  cache: TokenCache;
  registry: TenantRegistry;
  logger: LoggerLike;
  now?: () => Date;
}

export class CredentialResolver {
  private readonly tokenClient: TokenEndpointClient;
  private readonly systemIdentity: SystemIdentity;
  private readonly cache: TokenCache;
  private readonly registry: TenantRegistry;
  private readonly logger: LoggerLike;
  private readonly now: () => Date;

  constructor(deps: CredentialResolverDependencies) {
    this.tokenClient = deps.tokenClient;
    this.systemIdentity = deps.systemIdentity;
    this.cache = deps.cache;
    this.registry = deps.registry;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Resolves a credential or throws. `obo_failed` outcomes surface as their
   * error; a fallback outcome is returned like any other credential.
   */
  async resolve(input: ResolveCredentialInput): Promise<Credential> {
    const outcome = await this.resolveOutcome(input);
    if (outcome.kind === "obo_failed") {
      throw outcome.error;
    }

    return outcome.credential;
  }

  async resolveOutcome(input: ResolveCredentialInput): Promise<ResolutionOutcome> {
    const resource = normalizeResource(input.resource);
    const purpose = input.purpose ?? "user_data";

    if (!input.principal) {
      const tenantId = input.tenantId ?? this.registry.home;
      if (!this.registry.isAuthorized(tenantId)) {
        throw unauthorizedTenant(tenantId);
      }

      const credential = await this.acquireSystemCredential(tenantId, resource, "system_identity");
      return { kind: "system_identity", credential };
    }

    const principal = input.principal;
    if (!this.registry.isAuthorized(principal.tenantId)) {
      throw unauthorizedTenant(principal.tenantId);
    }

    const tenantId = input.tenantId ?? principal.tenantId;
    const probing = !this.registry.isAuthorized(tenantId);
    if (probing && !this.canProbe(this.registry.access(tenantId))) {
      throw unauthorizedTenant(tenantId);
    }

    const assertionFingerprint = sha256Hex(principal.token);
    const logContext = {
      tenantId,
      resource,
      purpose,
      subject: fingerprint(principal.subjectId),
      assertion: assertionFingerprint.slice(0, 16)
    };

    let token: IssuedToken;
    try {
      token = await this.cache.getOrFetch({ tenantId, resource, assertionFingerprint }, () =>
        this.tokenClient.exchangeOnBehalfOf({
          tenantId,
          assertion: principal.token,
          scope: toScope(resource)
        })
      );
    } catch (error) {
      if (!(error instanceof TokenRequestError)) {
        throw error;
      }

      const failure = new OboExchangeError({
        reason: error.reason,
        tenantId,
        resource,
        message: `Delegated token exchange for ${resource} in tenant ${tenantId} failed (${error.reason})`,
        cause: error
      });
      this.logger.warn(
        { ...logContext, reason: error.reason, providerCode: error.providerCode },
        "On-behalf-of exchange failed"
      );

      if (probing) {
        return { kind: "obo_failed", error: unauthorizedTenant(tenantId) };
      }

      if (purpose !== "bootstrap") {
        return { kind: "obo_failed", error: failure };
      }

      return this.fallback(tenantId, resource, failure);
    }

    if (probing) {
      await this.registry.recordEvidence(tenantId, {
        resource,
        sourceTenantId: principal.tenantId,
        subjectFingerprint: fingerprint(principal.subjectId),
        observedAt: this.now().toISOString()
      });
    }

    this.logger.debug({ ...logContext, strategy: "obo" }, "Credential resolved");
    return {
      kind: "obo",
      credential: new Credential(
        { strategy: "obo", attribution: "user", tenantId, resource },
        token
      )
    };
  }

  private canProbe(access: TenantAccess) {
    return (
      this.registry.discoveryEnabled && (access === "unknown" || access === "pending_evidence")
    );
  }

  private async fallback(
    tenantId: string,
    resource: string,
    failure: OboExchangeError
  ): Promise<ResolutionOutcome> {
    try {
      const credential = await this.acquireSystemCredential(tenantId, resource, "fallback_identity");
      this.logger.warn(
        { tenantId, resource, reason: failure.reason, strategy: "fallback_identity" },
        "Bootstrap request fell back to the system identity"
      );
      return { kind: "obo_failed_fallback_used", credential, failure };
    } catch (error) {
      if (error instanceof BrokerError) {
        return { kind: "obo_failed", error };
      }
      throw error;
    }
  }

  private async acquireSystemCredential(
    tenantId: string,
    resource: string,
    strategy: "system_identity" | "fallback_identity"
  ): Promise<Credential> {
    let token: IssuedToken;
    try {
      token = await this.cache.getOrFetch(
        { tenantId, resource, assertionFingerprint: SYSTEM_FINGERPRINT },
        () => this.systemIdentity.acquire({ tenantId, resource })
      );
    } catch (error) {
      if (error instanceof TokenRequestError) {
        this.logger.error(
          { tenantId, resource, reason: error.reason, identity: this.systemIdentity.kind },
          "System identity token request failed"
        );
        throw systemIdentityUnavailable(
          `System identity could not obtain a token for ${resource} in tenant ${tenantId}`,
          error
        );
      }
      throw error;
    }

    this.logger.debug({ tenantId, resource, strategy }, "Credential resolved");
    return new Credential({ strategy, attribution: "system", tenantId, resource }, token);
  }
}
