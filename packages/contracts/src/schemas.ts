import { z } from "zod";

export const HealthResponseSchema = z.object({
  status: z.literal("ok"),
  timestamp: z.string().datetime(),
  version: z.string().min(1)
});

export const ApiErrorSchema = z.object({
  code: z.string().min(1),
  message: z.string().min(1),
  requestId: z.string().min(1).optional()
});

export const TenantRoleSchema = z.enum(["home", "delegated"]);
export const TenantStatusSchema = z.enum(["pending_evidence", "authorized"]);
export const TenantSourceSchema = z.enum(["config", "registered", "discovered"]);

export const PrincipalSchema = z.object({
  subjectId: z.string().min(1),
  tenantId: z.string().min(1),
  name: z.string().nullable(),
  preferredUsername: z.string().nullable(),
  scopes: z.array(z.string()),
  roles: z.array(z.string()),
  expiresAt: z.string().datetime()
});

export const TenantSummarySchema = z.object({
  tenantId: z.string().min(1),
  displayName: z.string().min(1),
  role: TenantRoleSchema,
  status: TenantStatusSchema,
  source: TenantSourceSchema,
  enabled: z.boolean(),
  workspaceConfigured: z.boolean(),
  updatedAt: z.string().datetime()
});

export const AuthStatusResponseSchema = z.object({
  authenticated: z.literal(true),
  principal: PrincipalSchema,
  tenant: TenantSummarySchema,
  multiTenantEnabled: z.boolean(),
  autoDiscoveryEnabled: z.boolean()
});

export const TenantListResponseSchema = z.object({
  tenants: z.array(TenantSummarySchema),
  count: z.number().int().nonnegative()
});

export const TenantParamsSchema = z.object({
  tenantId: z.string().min(1).max(128)
});

export const TenantProbeResponseSchema = z.object({
  tenant: TenantSummarySchema
});

export const CacheFlushResponseSchema = z.object({
  tenantId: z.string().min(1),
  flushed: z.number().int().nonnegative()
});

export const IncidentSeveritySchema = z.enum(["high", "medium", "low", "informational"]);
export const IncidentStatusFilterSchema = z.enum(["active", "closed", "all"]);

export const IncidentQuerySchema = z.object({
  severity: IncidentSeveritySchema.optional(),
  status: IncidentStatusFilterSchema.default("active"),
  limit: z.coerce.number().int().min(1).max(200).default(50)
});

export const IncidentSchema = z.object({
  id: z.string().min(1),
  number: z.number().int().nullable(),
  title: z.string(),
  severity: z.string(),
  status: z.string(),
  createdAt: z.string().nullable()
});

export const IncidentListResponseSchema = z.object({
  tenantId: z.string().min(1),
  incidents: z.array(IncidentSchema),
  count: z.number().int().nonnegative(),
  attribution: z.enum(["user", "system"])
});

export type HealthResponse = z.infer<typeof HealthResponseSchema>;
export type ApiError = z.infer<typeof ApiErrorSchema>;
export type Principal = z.infer<typeof PrincipalSchema>;
export type TenantSummary = z.infer<typeof TenantSummarySchema>;
export type AuthStatusResponse = z.infer<typeof AuthStatusResponseSchema>;
export type TenantListResponse = z.infer<typeof TenantListResponseSchema>;
export type TenantProbeResponse = z.infer<typeof TenantProbeResponseSchema>;
export type CacheFlushResponse = z.infer<typeof CacheFlushResponseSchema>;
export type IncidentQuery = z.infer<typeof IncidentQuerySchema>;
export type Incident = z.infer<typeof IncidentSchema>;
export type IncidentListResponse = z.infer<typeof IncidentListResponseSchema>;
