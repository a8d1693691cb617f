import { decodeJwt, errors as joseErrors, jwtVerify, type JWTPayload } from "jose";
import type { ApiConfig } from "../config/index.js";
import type { LoggerLike } from "../lib/logger.js";
import {
  downstreamUnavailable,
  invalidToken,
  permissionDenied,
  unauthorizedTenant
} from "./errors.js";
import { buildAcceptedIssuers, tenantFromIssuer } from "./issuer.js";
import type { SigningKeyResolver } from "./signing-keys.js";
import type { TenantRegistry } from "./tenant-registry.js";
import type { VerifiedPrincipal } from "./types.js";

function claimAsString(payload: JWTPayload, key: string): string | null {
  const value = payload[key];
  return typeof value === "string" && value.trim().length > 0 ? value : null;
}

function parseScopes(payload: JWTPayload) {
  const scopeString = claimAsString(payload, "scp");
  if (!scopeString) {
    return new Set<string>();
  }

  return new Set(
    scopeString
      .split(/\s+/u)
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  );
}

function parseRoles(payload: JWTPayload) {
  const roles = payload.roles;
  if (!Array.isArray(roles)) {
    return new Set<string>();
  }

  return new Set(
    roles
      .filter((role): role is string => typeof role === "string")
      .map((role) => role.trim())
      .filter((role) => role.length > 0)
  );
}

function parseAudience(payload: JWTPayload): string[] {
  if (typeof payload.aud === "string") {
    return [payload.aud];
  }

  return Array.isArray(payload.aud) ? payload.aud : [];
}

function describeVerificationFailure(error: unknown) {
  if (error instanceof joseErrors.JWTExpired) {
    return "Token has expired";
  }

  if (error instanceof joseErrors.JWTClaimValidationFailed) {
    return `Token ${error.claim} claim is invalid`;
  }

  return "Token signature could not be verified";
}

export type TokenValidatorConfig = Pick<
  ApiConfig,
  "authorityHost" | "audiences" | "clockToleranceSeconds" | "requiredScopes"
>;

export interface TokenValidatorDependencies {
  config: TokenValidatorConfig;
  registry: TenantRegistry;
  signingKeys: SigningKeyResolver;
  logger: LoggerLike;
  now?: () => Date;
}

/**
 * Validates inbound Entra ID access tokens: issuer shape and tenant
 * membership first, then signature, audience and lifetime against the issuing
 * tenant's signing keys.
 */
export class TokenValidator {
  private readonly config: TokenValidatorConfig;
  private readonly registry: TenantRegistry;
  private readonly signingKeys: SigningKeyResolver;
  private readonly logger: LoggerLike;
  private readonly now: () => Date;

  constructor(deps: TokenValidatorDependencies) {
    this.config = deps.config;
    this.registry = deps.registry;
    this.signingKeys = deps.signingKeys;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  async validate(token: string): Promise<VerifiedPrincipal> {
    let claims: JWTPayload;
    try {
      claims = decodeJwt(token);
    } catch {
      throw invalidToken("Token is not a well-formed JWT");
    }

    const issuer = claimAsString(claims, "iss");
    if (!issuer) {
      throw invalidToken("Token is missing issuer claim");
    }

    const tenantId = tenantFromIssuer(issuer, this.config.authorityHost);
    if (!tenantId) {
      throw invalidToken("Token issuer is not a recognised Entra ID issuer");
    }

    const tenantClaim = claimAsString(claims, "tid");
    if (tenantClaim && tenantClaim !== tenantId) {
      throw invalidToken("Token tenant claim does not match its issuer");
    }

    if (!this.registry.isAuthorized(tenantId)) {
      await this.observeUnknownTenant(tenantId, token);
      throw unauthorizedTenant(tenantId);
    }

    const payload = await this.verifySignature(token, tenantId);

    const subjectId = claimAsString(payload, "oid") ?? claimAsString(payload, "sub");
    if (!subjectId) {
      throw invalidToken("Token is missing subject claim");
    }

    if (typeof payload.exp !== "number") {
      throw invalidToken("Token is missing expiry claim");
    }

    const scopes = parseScopes(payload);
    const roles = parseRoles(payload);
    const required = this.config.requiredScopes;
    if (required.length > 0 && !required.some((scope) => scopes.has(scope) || roles.has(scope))) {
      throw permissionDenied(`Token lacks a required scope: ${required.join(", ")}`);
    }

    return {
      subjectId,
      tenantId,
      issuer,
      audience: parseAudience(payload),
      scopes,
      roles,
      name: claimAsString(payload, "name"),
      preferredUsername: claimAsString(payload, "preferred_username"),
      expiresAt: new Date(payload.exp * 1000),
      token,
      rawClaims: payload
    };
  }

  private async verifySignature(token: string, tenantId: string): Promise<JWTPayload> {
    try {
      const { payload } = await jwtVerify(token, this.signingKeys.forTenant(tenantId), {
        issuer: buildAcceptedIssuers(tenantId, this.config.authorityHost),
        audience: this.config.audiences,
        clockTolerance: this.config.clockToleranceSeconds,
        algorithms: ["RS256"],
        requiredClaims: ["exp"],
        currentDate: this.now()
      });
      return payload;
    } catch (error) {
      if (error instanceof joseErrors.JWKSTimeout || !(error instanceof joseErrors.JOSEError)) {
        this.logger.error({ err: error, tenantId }, "Signing keys could not be retrieved");
        throw downstreamUnavailable(`Signing keys for tenant ${tenantId} are unavailable`, 503, error);
      }

      throw invalidToken(describeVerificationFailure(error));
    }
  }

  /**
   * A token from a tenant outside the allow-list is still rejected. With
   * discovery on, a cryptographically valid one records the tenant as pending
   * evidence. Both the signature check and the observation are rate-limited
   * by the registry.
   */
  private async observeUnknownTenant(tenantId: string, token: string) {
    if (
      this.registry.access(tenantId) !== "unknown" ||
      !this.registry.admitUnknownTenantCheck(tenantId)
    ) {
      return;
    }

    try {
      await this.verifySignature(token, tenantId);
    } catch (error) {
      this.logger.debug({ err: error, tenantId }, "Unverified token from unknown tenant ignored");
      return;
    }

    const result = await this.registry.observe(tenantId);
    this.logger.info({ tenantId, result }, "Token from unknown tenant observed");
  }
}
