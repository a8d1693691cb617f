import {
  createLocalJWKSet,
  exportJWK,
  generateKeyPair,
  SignJWT,
  type JWTPayload,
  type JWTVerifyGetKey,
  type KeyLike
} from "jose";

export interface TestTokenOptions {
  tenantId: string;
  audience: string;
  subject?: string;
  scopes?: string[];
  roles?: string[];
  issuerFormat?: "v2" | "sts";
  issuer?: string;
  issuedAt?: Date;
  expiresInSeconds?: number;
  claims?: JWTPayload;
}

export interface TestSigningAuthority {
  authorityHost: string;
  forTenant(tenantId: string): JWTVerifyGetKey;
  signAccessToken(options: TestTokenOptions): Promise<string>;
}

/**
 * A local stand-in for the identity provider's signing keys. Every tenant
 * shares one RS256 key, as Entra ID tenants share the platform keys.
 */
export async function createTestSigningAuthority(
  authorityHost = "https://login.microsoftonline.com"
): Promise<TestSigningAuthority> {
  const { privateKey, publicKey } = await generateKeyPair("RS256");
  return buildAuthority(authorityHost, privateKey, publicKey, "test-key-1");
}

async function buildAuthority(
  authorityHost: string,
  privateKey: KeyLike,
  publicKey: KeyLike,
  kid: string
): Promise<TestSigningAuthority> {
  const publicJwk = await exportJWK(publicKey);
  const keySet = createLocalJWKSet({
    keys: [{ ...publicJwk, kid, alg: "RS256", use: "sig" }]
  });

  const issuerFor = (tenantId: string, format: "v2" | "sts") =>
    format === "v2"
      ? `${authorityHost}/${tenantId}/v2.0`
      : `https://sts.windows.net/${tenantId}/`;

  return {
    authorityHost,
    forTenant: () => keySet,
    async signAccessToken(options) {
      const issuedAtSeconds = Math.floor((options.issuedAt ?? new Date()).getTime() / 1000);
      const payload: JWTPayload = {
        tid: options.tenantId,
        oid: options.subject ?? "user-object-id",
        name: "Test Analyst",
        preferred_username: "analyst@example.test",
        ...options.claims
      };
      if (options.scopes) {
        payload.scp = options.scopes.join(" ");
      }
      if (options.roles) {
        payload.roles = options.roles;
      }

      return new SignJWT(payload)
        .setProtectedHeader({ alg: "RS256", typ: "JWT", kid })
        .setIssuer(options.issuer ?? issuerFor(options.tenantId, options.issuerFormat ?? "v2"))
        .setAudience(options.audience)
        .setSubject(options.subject ?? "user-object-id")
        .setIssuedAt(issuedAtSeconds)
        .setNotBefore(issuedAtSeconds)
        .setExpirationTime(issuedAtSeconds + (options.expiresInSeconds ?? 3_600))
        .sign(privateKey);
    }
  };
}
