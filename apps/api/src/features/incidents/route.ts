import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { type ZodTypeProvider } from "fastify-type-provider-zod";
import {
  ApiErrorSchema,
  IncidentListResponseSchema,
  IncidentQuerySchema,
  TenantParamsSchema
} from "@idbroker/contracts";
import { notFound, unauthorizedTenant } from "../../auth/errors.js";
import { getRequestAuth, wrapAsyncPreHandler } from "../../auth/middleware.js";
import type { TenantRegistry } from "../../auth/tenant-registry.js";
import type { SentinelClient } from "../../downstream/sentinel-client.js";

interface RegisterIncidentRoutesOptions {
  requireAuth: (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>;
  registry: TenantRegistry;
  sentinel: SentinelClient;
}

export function registerIncidentRoutes(
  app: FastifyInstance,
  options: RegisterIncidentRoutesOptions
) {
  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.get(
    "/v1/tenants/:tenantId/incidents",
    {
      preHandler: wrapAsyncPreHandler(options.requireAuth),
      schema: {
        params: TenantParamsSchema,
        querystring: IncidentQuerySchema,
        response: {
          200: IncidentListResponseSchema,
          401: ApiErrorSchema,
          403: ApiErrorSchema,
          404: ApiErrorSchema
        }
      }
    },
    async (request) => {
      const auth = getRequestAuth(request);
      const { tenantId } = request.params;

      // Incident reads only target tenants already on the allow-list.
      if (!options.registry.isAuthorized(tenantId)) {
        throw unauthorizedTenant(tenantId);
      }

      const workspace = options.registry.get(tenantId)?.workspace;
      if (!workspace) {
        throw notFound(`No Sentinel workspace is configured for tenant ${tenantId}`);
      }

      const credential = await auth.credentialFor(options.sentinel.resource, { tenantId });
      const incidents = await options.sentinel.listIncidents(credential, {
        workspace,
        severity: request.query.severity,
        status: request.query.status,
        limit: request.query.limit
      });

      request.log.info(
        {
          tenantId,
          strategy: credential.context.strategy,
          attribution: credential.context.attribution,
          count: incidents.length
        },
        "Incidents listed"
      );

      return {
        tenantId,
        incidents,
        count: incidents.length,
        attribution: credential.context.attribution
      };
    }
  );
}
