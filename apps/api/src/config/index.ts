import { z } from "zod";
import { SECRET_BACKED_SETTINGS, type SecretProvider } from "./secrets.js";

const BooleanStringSchema = z.enum(["true", "false"]).transform((value) => value === "true");

const CsvStringSchema = z.string().transform((value) =>
  value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
);

const SentinelWorkspaceSchema = z.object({
  subscriptionId: z.string().min(1),
  resourceGroup: z.string().min(1),
  workspaceName: z.string().min(1)
});

const ConfiguredTenantSchema = z.object({
  tenantId: z.string().min(1),
  displayName: z.string().min(1).optional(),
  enabled: z.boolean().default(true),
  workspace: SentinelWorkspaceSchema.optional()
});

const JsonTenantsSchema = z.string().transform((value, ctx) => {
  try {
    const parsed = JSON.parse(value) as unknown;
    return z.array(ConfiguredTenantSchema).parse(parsed);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message:
        error instanceof Error
          ? `TENANTS_JSON must be a JSON array of tenants (${error.message})`
          : "TENANTS_JSON must be a JSON array of tenants"
    });
    return z.NEVER;
  }
});

function requiredSetting(envName: string) {
  return z.string({ required_error: `${envName} is required` }).min(1, `${envName} is required`);
}

const ApiConfigSchema = z.object({
  nodeEnv: z.enum(["development", "test", "production"]).default("development"),
  port: z.number().int().positive().default(3001),
  host: z.string().min(1).default("0.0.0.0"),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  serviceVersion: z.string().min(1).default("0.1.0"),
  homeTenantId: requiredSetting("AZURE_HOME_TENANT_ID"),
  clientId: requiredSetting("AZURE_CLIENT_ID"),
  clientSecret: requiredSetting("AZURE_CLIENT_SECRET"),
  audiences: z.array(z.string().min(1)).min(1),
  authorityHost: z
    .string()
    .url()
    .default("https://login.microsoftonline.com")
    .transform((value) => value.replace(/\/+$/u, "")),
  clockToleranceSeconds: z.number().int().nonnegative().default(60),
  requiredScopes: z.array(z.string().min(1)).default([]),
  multiTenantEnabled: z.boolean().default(false),
  autoDiscoveryEnabled: z.boolean().default(false),
  tenants: z.array(ConfiguredTenantSchema).default([]),
  discoveryMaxObservations: z.number().int().nonnegative().default(10),
  discoveryWindowSeconds: z.number().int().positive().default(3_600),
  tokenSafetyMarginSeconds: z.number().int().nonnegative().default(300),
  tokenCacheMaxEntries: z.number().int().positive().default(5_000),
  httpTimeoutMs: z.number().int().min(1_000).max(60_000).default(15_000),
  systemIdentityMode: z.enum(["managed_identity", "client_credentials"]).optional(),
  identityEndpoint: z.string().url().optional(),
  identityHeader: z.string().min(1).optional(),
  managedIdentityClientId: z.string().min(1).optional(),
  managementEndpoint: z
    .string()
    .url()
    .default("https://management.azure.com")
    .transform((value) => value.replace(/\/+$/u, "")),
  sentinelApiVersion: z.string().min(1).default("2023-02-01"),
  adminRole: z.string().min(1).default("Broker.Admin"),
  databaseUrl: z.string().min(1).optional()
});

export type ConfiguredTenant = z.infer<typeof ConfiguredTenantSchema>;
export type ApiConfig = z.infer<typeof ApiConfigSchema>;

function optionalNumber(value: string | undefined) {
  return value ? Number(value) : undefined;
}

function defaultAudiences(clientId: string | undefined) {
  if (!clientId) {
    return undefined;
  }

  return [clientId, `api://${clientId}`];
}

export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  return ApiConfigSchema.parse({
    nodeEnv: env.NODE_ENV,
    port: optionalNumber(env.API_PORT),
    host: env.API_HOST,
    logLevel: env.LOG_LEVEL,
    serviceVersion: env.SERVICE_VERSION,
    homeTenantId: env.AZURE_HOME_TENANT_ID,
    clientId: env.AZURE_CLIENT_ID,
    clientSecret: env.AZURE_CLIENT_SECRET,
    audiences: env.AUTH_AUDIENCE
      ? CsvStringSchema.parse(env.AUTH_AUDIENCE)
      : defaultAudiences(env.AZURE_CLIENT_ID),
    authorityHost: env.AZURE_AUTHORITY_HOST,
    clockToleranceSeconds: optionalNumber(env.AUTH_CLOCK_TOLERANCE_SECONDS),
    requiredScopes: env.REQUIRED_SCOPES ? CsvStringSchema.parse(env.REQUIRED_SCOPES) : undefined,
    multiTenantEnabled: env.MULTI_TENANT_ENABLED
      ? BooleanStringSchema.parse(env.MULTI_TENANT_ENABLED)
      : undefined,
    autoDiscoveryEnabled: env.ENABLE_AUTO_TENANT_DISCOVERY
      ? BooleanStringSchema.parse(env.ENABLE_AUTO_TENANT_DISCOVERY)
      : undefined,
    tenants: env.TENANTS_JSON ? JsonTenantsSchema.parse(env.TENANTS_JSON) : undefined,
    discoveryMaxObservations: optionalNumber(env.DISCOVERY_MAX_OBSERVATIONS),
    discoveryWindowSeconds: optionalNumber(env.DISCOVERY_WINDOW_SECONDS),
    tokenSafetyMarginSeconds: optionalNumber(env.TOKEN_SAFETY_MARGIN_SECONDS),
    tokenCacheMaxEntries: optionalNumber(env.TOKEN_CACHE_MAX_ENTRIES),
    httpTimeoutMs: optionalNumber(env.HTTP_TIMEOUT_MS),
    systemIdentityMode: env.SYSTEM_IDENTITY_MODE,
    identityEndpoint: env.IDENTITY_ENDPOINT,
    identityHeader: env.IDENTITY_HEADER,
    managedIdentityClientId: env.MANAGED_IDENTITY_CLIENT_ID,
    managementEndpoint: env.AZURE_MANAGEMENT_ENDPOINT,
    sentinelApiVersion: env.SENTINEL_API_VERSION,
    adminRole: env.ADMIN_ROLE,
    databaseUrl: env.DATABASE_URL
  });
}

/**
 * Loads configuration with secret-backed settings taking precedence over the
 * plain environment. Secrets the provider does not hold fall through to `env`.
 */
export async function loadApiConfigWithSecrets(
  env: NodeJS.ProcessEnv,
  secrets: SecretProvider
): Promise<ApiConfig> {
  const merged: NodeJS.ProcessEnv = { ...env };

  for (const setting of SECRET_BACKED_SETTINGS) {
    const value = await secrets.getSecret(setting.secretName);
    if (value !== undefined) {
      merged[setting.envName] = value;
    }
  }

  return loadApiConfig(merged);
}
