import { z } from "zod";
import type { TokenFailureReason } from "./errors.js";
import type { IssuedToken } from "./types.js";

const JWT_BEARER_GRANT = "urn:ietf:params:oauth:grant-type:jwt-bearer";

const TokenSuccessSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().int().positive().optional(),
  expires_on: z.coerce.number().int().positive().optional()
});

const TokenErrorSchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional(),
  error_codes: z.array(z.number()).optional()
});

const CONSENT_CODES = ["AADSTS65001", "AADSTS65004"];
const TENANT_MISMATCH_CODES = ["AADSTS50020", "AADSTS700016", "AADSTS90072", "AADSTS500011"];

export class TokenRequestError extends Error {
  readonly reason: TokenFailureReason;
  readonly tenantId: string;
  readonly providerCode: string | null;
  readonly status: number | null;

  constructor(input: {
    reason: TokenFailureReason;
    tenantId: string;
    message: string;
    providerCode?: string | null;
    status?: number | null;
    cause?: unknown;
  }) {
    super(input.message, { cause: input.cause });
    this.name = "TokenRequestError";
    this.reason = input.reason;
    this.tenantId = input.tenantId;
    this.providerCode = input.providerCode ?? null;
    this.status = input.status ?? null;
  }
}

export function classifyTokenError(input: {
  status: number;
  error: string | null;
  description: string | null;
}): TokenFailureReason {
  const description = input.description ?? "";
  if (
    input.error === "consent_required" ||
    CONSENT_CODES.some((code) => description.includes(code))
  ) {
    return "consent_required";
  }

  if (TENANT_MISMATCH_CODES.some((code) => description.includes(code))) {
    return "tenant_mismatch";
  }

  // Provider-side outages are transport failures, not rejections of the grant.
  if (input.status >= 500 || input.status === 429) {
    return "network";
  }

  return "rejected";
}

function firstLine(value: string) {
  return value.split(/\r?\n/u)[0]?.trim() ?? "";
}

function describeFailure(error: string | null, description: string | null) {
  if (error && description) {
    return `${error}: ${firstLine(description)}`;
  }

  return error ?? (description ? firstLine(description) : "unknown error");
}

export function toScope(resource: string) {
  const trimmed = resource.trim();
  if (trimmed.endsWith("/.default")) {
    return trimmed;
  }

  return `${trimmed.replace(/\/+$/u, "")}/.default`;
}

export function normalizeResource(resource: string) {
  return resource.trim().replace(/\/\.default$/u, "").replace(/\/+$/u, "");
}

export interface TokenEndpointClient {
  exchangeOnBehalfOf(input: {
    tenantId: string;
    assertion: string;
    scope: string;
  }): Promise<IssuedToken>;
}

export interface EntraTokenClientOptions {
  authorityHost: string;
  clientId: string;
  clientSecret: string;
  timeoutMs: number;
  fetch?: typeof globalThis.fetch;
  now?: () => Date;
}

/**
 * OAuth2 client for the Entra ID token endpoint. Every request is bounded by
 * `timeoutMs` and failures surface as {@link TokenRequestError} with a
 * classified reason. Nothing is retried here.
 */
export class EntraTokenClient implements TokenEndpointClient {
  private readonly authorityHost: string;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof globalThis.fetch;
  private readonly now: () => Date;

  constructor(options: EntraTokenClientOptions) {
    this.authorityHost = options.authorityHost.replace(/\/+$/u, "");
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.now = options.now ?? (() => new Date());
  }

  tokenEndpoint(tenantId: string) {
    return `${this.authorityHost}/${encodeURIComponent(tenantId)}/oauth2/v2.0/token`;
  }

  exchangeOnBehalfOf(input: {
    tenantId: string;
    assertion: string;
    scope: string;
  }): Promise<IssuedToken> {
    return this.requestToken(
      input.tenantId,
      new URLSearchParams({
        client_id: this.clientId,
        client_secret: this.clientSecret,
        grant_type: JWT_BEARER_GRANT,
        requested_token_use: "on_behalf_of",
        assertion: input.assertion,
        scope: input.scope
      })
    );
  }

  private async requestToken(tenantId: string, body: URLSearchParams): Promise<IssuedToken> {
    const requestedAt = this.now();
    let response: Response;
    try {
      response = await this.fetchImpl(this.tokenEndpoint(tenantId), {
        method: "POST",
        headers: {
          "content-type": "application/x-www-form-urlencoded",
          accept: "application/json"
        },
        body,
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      const timedOut = error instanceof Error && error.name === "TimeoutError";
      throw new TokenRequestError({
        reason: "network",
        tenantId,
        message: timedOut
          ? `Token endpoint for tenant ${tenantId} did not respond within ${this.timeoutMs}ms`
          : `Token endpoint for tenant ${tenantId} is unreachable`,
        cause: error
      });
    }

    const payload: unknown = await response.json().catch(() => null);

    if (!response.ok) {
      const parsedError = TokenErrorSchema.safeParse(payload);
      const error = parsedError.success ? parsedError.data.error ?? null : null;
      const description = parsedError.success ? parsedError.data.error_description ?? null : null;
      throw new TokenRequestError({
        reason: classifyTokenError({ status: response.status, error, description }),
        tenantId,
        providerCode: error,
        status: response.status,
        message: `Token request for tenant ${tenantId} failed (${response.status}): ${describeFailure(error, description)}`
      });
    }

    const parsed = TokenSuccessSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TokenRequestError({
        reason: "rejected",
        tenantId,
        status: response.status,
        message: `Token endpoint for tenant ${tenantId} returned an unexpected payload`
      });
    }

    return {
      accessToken: parsed.data.access_token,
      expiresAt: resolveExpiry(parsed.data, requestedAt)
    };
  }
}

/**
 * v2.0 token endpoints report lifetime as `expires_in` (seconds from now);
 * v1.0 responses may carry only `expires_on` (epoch seconds).
 */
export function resolveExpiry(
  payload: { expires_in?: number; expires_on?: number },
  requestedAt: Date
): Date {
  if (payload.expires_in !== undefined) {
    return new Date(requestedAt.getTime() + payload.expires_in * 1000);
  }

  if (payload.expires_on !== undefined) {
    return new Date(payload.expires_on * 1000);
  }

  // No lifetime reported: treat as already expired so it is never cached.
  return requestedAt;
}
