import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { type ZodTypeProvider } from "fastify-type-provider-zod";
import { ApiErrorSchema, AuthStatusResponseSchema } from "@idbroker/contracts";
import { unauthorizedTenant } from "../../auth/errors.js";
import { getRequestAuth, wrapAsyncPreHandler } from "../../auth/middleware.js";
import type { TenantRegistry } from "../../auth/tenant-registry.js";
import { toTenantSummary } from "../tenants/summary.js";

interface RegisterAuthStatusRouteOptions {
  requireAuth: (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>;
  registry: TenantRegistry;
}

export function registerAuthStatusRoute(
  app: FastifyInstance,
  options: RegisterAuthStatusRouteOptions
) {
  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.get(
    "/v1/auth/status",
    {
      preHandler: wrapAsyncPreHandler(options.requireAuth),
      schema: {
        response: {
          200: AuthStatusResponseSchema,
          401: ApiErrorSchema,
          403: ApiErrorSchema
        }
      }
    },
    async (request) => {
      const { principal } = getRequestAuth(request);
      const tenant = options.registry.get(principal.tenantId);
      if (!tenant) {
        throw unauthorizedTenant(principal.tenantId);
      }

      return {
        authenticated: true as const,
        principal: {
          subjectId: principal.subjectId,
          tenantId: principal.tenantId,
          name: principal.name,
          preferredUsername: principal.preferredUsername,
          scopes: [...principal.scopes].sort(),
          roles: [...principal.roles].sort(),
          expiresAt: principal.expiresAt.toISOString()
        },
        tenant: toTenantSummary(tenant),
        multiTenantEnabled: options.registry.multiTenant,
        autoDiscoveryEnabled: options.registry.discoveryEnabled
      };
    }
  );
}
