import type { Credential, CredentialResolver } from "./credential-resolver.js";
import { invalidToken } from "./errors.js";
import type { TokenValidator } from "./token-validator.js";
import type { CredentialPurpose, VerifiedPrincipal } from "./types.js";

export function parseBearerToken(header: string | undefined) {
  if (!header) {
    throw invalidToken("Missing Authorization header");
  }

  const match = header.match(/^Bearer\s+(\S+)\s*$/iu);
  if (!match) {
    throw invalidToken("Authorization header must be a Bearer token");
  }

  const token = match[1];
  if (!token) {
    throw invalidToken("Authorization header must include a token");
  }

  return token;
}

export interface CredentialRequestOptions {
  tenantId?: string;
  purpose?: CredentialPurpose;
}

/** The calling context of one authenticated request. */
export interface AuthenticatedContext {
  principal: VerifiedPrincipal;
  credentialFor(resource: string, options?: CredentialRequestOptions): Promise<Credential>;
}

export class RequestAuthenticator {
  private readonly validator: TokenValidator;
  private readonly resolver: CredentialResolver;

  constructor(deps: { validator: TokenValidator; resolver: CredentialResolver }) {
    this.validator = deps.validator;
    this.resolver = deps.resolver;
  }

  async authenticate(authorizationHeader: string | undefined): Promise<AuthenticatedContext> {
    const token = parseBearerToken(authorizationHeader);
    const principal = await this.validator.validate(token);
    const resolver = this.resolver;

    return {
      principal,
      credentialFor(resource, options = {}) {
        return resolver.resolve({
          resource,
          tenantId: options.tenantId,
          principal,
          purpose: options.purpose ?? "user_data"
        });
      }
    };
  }
}
