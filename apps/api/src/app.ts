import Fastify, { type FastifyInstance } from "fastify";
import {
  hasZodFastifySchemaValidationErrors,
  serializerCompiler,
  validatorCompiler
} from "fastify-type-provider-zod";
import { BrokerError } from "./auth/errors.js";
import { buildAuthPreHandler, buildRolePreHandler, replyWithBrokerError } from "./auth/middleware.js";
import { createBroker, type Broker, type BrokerOptions } from "./broker.js";
import type { ApiConfig } from "./config/index.js";
import { registerAuthStatusRoute } from "./features/auth/status-route.js";
import { registerHealthRoute } from "./features/health/route.js";
import { registerIncidentRoutes } from "./features/incidents/route.js";
import { registerTenantRoutes } from "./features/tenants/route.js";

export interface BuildApiAppOptions
  extends Pick<BrokerOptions, "fetch" | "signingKeys" | "tenantStore" | "tokenClient" | "systemIdentity"> {
  config: ApiConfig;
  now?: () => Date;
}

export interface ApiApp {
  app: FastifyInstance;
  broker: Broker;
}

export async function buildApiApp(options: BuildApiAppOptions): Promise<ApiApp> {
  const { config } = options;
  const now = options.now ?? (() => new Date());

  const app = Fastify({
    logger: {
      level: config.logLevel,
      redact: ["req.headers.authorization", "req.headers.cookie"]
    },
    requestIdHeader: "x-request-id"
  });
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  const broker = await createBroker({
    config,
    logger: app.log,
    now,
    fetch: options.fetch,
    signingKeys: options.signingKeys,
    tenantStore: options.tenantStore,
    tokenClient: options.tokenClient,
    systemIdentity: options.systemIdentity
  });
  app.addHook("onClose", async () => {
    await broker.close();
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof BrokerError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, "Upstream dependency failed");
      }
      return replyWithBrokerError(request, reply, error);
    }

    if (hasZodFastifySchemaValidationErrors(error)) {
      return reply.status(400).send({
        code: "invalid_request",
        message: error.message,
        requestId: request.id
      });
    }

    request.log.error({ err: error }, "Unhandled request error");
    return reply.status(500).send({
      code: "internal_error",
      message: "Internal server error",
      requestId: request.id
    });
  });

  app.setNotFoundHandler((request, reply) =>
    reply.status(404).send({
      code: "not_found",
      message: "Route not found",
      requestId: request.id
    })
  );

  const requireAuth = buildAuthPreHandler({ authenticator: broker.authenticator });
  const requireAdmin = buildRolePreHandler(config.adminRole);

  registerHealthRoute(app, { now, version: config.serviceVersion });
  registerAuthStatusRoute(app, { requireAuth, registry: broker.registry });
  registerTenantRoutes(app, {
    requireAuth,
    requireAdmin,
    registry: broker.registry,
    cache: broker.cache,
    probeResource: broker.sentinel.resource
  });
  registerIncidentRoutes(app, {
    requireAuth,
    registry: broker.registry,
    sentinel: broker.sentinel
  });

  return { app, broker };
}
