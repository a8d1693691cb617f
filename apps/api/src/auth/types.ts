export type TenantRole = "home" | "delegated";
export type TenantStatus = "pending_evidence" | "authorized";
export type TenantSource = "config" | "registered" | "discovered";
export type TenantAccess = TenantStatus | "unknown" | "disabled";

export interface SentinelWorkspace {
  subscriptionId: string;
  resourceGroup: string;
  workspaceName: string;
}

export interface DelegationEvidence {
  resource: string;
  sourceTenantId: string;
  subjectFingerprint: string;
  observedAt: string;
}

export interface TenantRecord {
  tenantId: string;
  displayName: string;
  role: TenantRole;
  status: TenantStatus;
  source: TenantSource;
  enabled: boolean;
  workspace: SentinelWorkspace | null;
  evidence: DelegationEvidence | null;
  createdAt: string;
  updatedAt: string;
}

export interface VerifiedPrincipal {
  subjectId: string;
  tenantId: string;
  issuer: string;
  audience: string[];
  scopes: Set<string>;
  roles: Set<string>;
  name: string | null;
  preferredUsername: string | null;
  expiresAt: Date;
  token: string;
  rawClaims: Record<string, unknown>;
}

/**
 * `user_data` requests must run under the caller's identity. Only `bootstrap`
 * requests (configuration and startup reads) may fall back to the system identity.
 */
export type CredentialPurpose = "user_data" | "bootstrap";
export type CredentialStrategy = "obo" | "fallback_identity" | "system_identity";
export type Attribution = "user" | "system";

export interface IssuedToken {
  accessToken: string;
  expiresAt: Date;
}

export interface CredentialContext {
  strategy: CredentialStrategy;
  attribution: Attribution;
  tenantId: string;
  resource: string;
}
