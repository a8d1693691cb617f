import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { type ZodTypeProvider } from "fastify-type-provider-zod";
import {
  ApiErrorSchema,
  CacheFlushResponseSchema,
  TenantListResponseSchema,
  TenantParamsSchema,
  TenantProbeResponseSchema
} from "@idbroker/contracts";
import { unauthorizedTenant } from "../../auth/errors.js";
import { getRequestAuth, wrapAsyncPreHandler } from "../../auth/middleware.js";
import type { TenantRegistry } from "../../auth/tenant-registry.js";
import type { TokenCache } from "../../auth/token-cache.js";
import { toTenantSummary } from "./summary.js";

type PreHandler = (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>;

interface RegisterTenantRoutesOptions {
  requireAuth: PreHandler;
  requireAdmin: PreHandler;
  registry: TenantRegistry;
  cache: TokenCache;
  probeResource: string;
}

export function registerTenantRoutes(app: FastifyInstance, options: RegisterTenantRoutesOptions) {
  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.get(
    "/v1/tenants",
    {
      preHandler: wrapAsyncPreHandler(options.requireAuth),
      schema: {
        response: {
          200: TenantListResponseSchema,
          401: ApiErrorSchema,
          403: ApiErrorSchema
        }
      }
    },
    async () => {
      const tenants = options.registry.list().map(toTenantSummary);
      return { tenants, count: tenants.length };
    }
  );

  typedApp.post(
    "/v1/tenants/:tenantId/cache/flush",
    {
      preHandler: [
        wrapAsyncPreHandler(options.requireAuth),
        wrapAsyncPreHandler(options.requireAdmin)
      ],
      schema: {
        params: TenantParamsSchema,
        response: {
          200: CacheFlushResponseSchema,
          401: ApiErrorSchema,
          403: ApiErrorSchema
        }
      }
    },
    async (request) => {
      const { tenantId } = request.params;
      const flushed = options.cache.flushTenant(tenantId);
      request.log.info({ tenantId, flushed }, "Token cache flushed for tenant");
      return { tenantId, flushed };
    }
  );

  // Runs a delegated exchange against the tenant; success is the delegation
  // evidence that authorizes a discovered tenant.
  typedApp.post(
    "/v1/tenants/:tenantId/probe",
    {
      preHandler: wrapAsyncPreHandler(options.requireAuth),
      schema: {
        params: TenantParamsSchema,
        response: {
          200: TenantProbeResponseSchema,
          401: ApiErrorSchema,
          403: ApiErrorSchema
        }
      }
    },
    async (request) => {
      const auth = getRequestAuth(request);
      const { tenantId } = request.params;

      await auth.credentialFor(options.probeResource, { tenantId });

      const tenant = options.registry.get(tenantId);
      if (!tenant || !options.registry.isAuthorized(tenantId)) {
        throw unauthorizedTenant(tenantId);
      }

      return { tenant: toTenantSummary(tenant) };
    }
  );
}
