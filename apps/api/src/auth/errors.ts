export const UNAUTHORIZED_ERROR_CODES = ["invalid_token"] as const;
export const FORBIDDEN_ERROR_CODES = ["unauthorized_tenant", "permission_denied"] as const;
export const UPSTREAM_ERROR_CODES = [
  "obo_exchange_failed",
  "system_identity_unavailable",
  "downstream_unavailable",
  "downstream_rejected"
] as const;

export type UnauthorizedErrorCode = (typeof UNAUTHORIZED_ERROR_CODES)[number];
export type ForbiddenErrorCode = (typeof FORBIDDEN_ERROR_CODES)[number];
export type UpstreamErrorCode = (typeof UPSTREAM_ERROR_CODES)[number];
export type BrokerErrorCode =
  | UnauthorizedErrorCode
  | ForbiddenErrorCode
  | UpstreamErrorCode
  | "not_found";

export type BrokerErrorStatus = 401 | 403 | 404 | 502 | 503;

export class BrokerError extends Error {
  readonly statusCode: BrokerErrorStatus;
  readonly code: BrokerErrorCode;

  constructor(
    statusCode: BrokerErrorStatus,
    code: BrokerErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "BrokerError";
    this.statusCode = statusCode;
    this.code = code;
  }
}

export type TokenFailureReason = "consent_required" | "tenant_mismatch" | "network" | "rejected";

export class OboExchangeError extends BrokerError {
  readonly reason: TokenFailureReason;
  readonly tenantId: string;
  readonly resource: string;

  constructor(input: {
    reason: TokenFailureReason;
    tenantId: string;
    resource: string;
    message: string;
    cause?: unknown;
  }) {
    super(
      input.reason === "consent_required" ? 403 : 502,
      "obo_exchange_failed",
      input.message,
      { cause: input.cause }
    );
    this.name = "OboExchangeError";
    this.reason = input.reason;
    this.tenantId = input.tenantId;
    this.resource = input.resource;
  }
}

export function invalidToken(message: string) {
  return new BrokerError(401, "invalid_token", message);
}

export function unauthorizedTenant(tenantId: string) {
  return new BrokerError(
    403,
    "unauthorized_tenant",
    `Tenant ${tenantId} is not authorized for this service`
  );
}

export function permissionDenied(message: string) {
  return new BrokerError(403, "permission_denied", message);
}

export function systemIdentityUnavailable(message: string, cause?: unknown) {
  return new BrokerError(503, "system_identity_unavailable", message, { cause });
}

export function downstreamUnavailable(message: string, statusCode: 502 | 503 = 503, cause?: unknown) {
  return new BrokerError(statusCode, "downstream_unavailable", message, { cause });
}

export function downstreamRejected(message: string) {
  return new BrokerError(502, "downstream_rejected", message);
}

export function notFound(message: string) {
  return new BrokerError(404, "not_found", message);
}
