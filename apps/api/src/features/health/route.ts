import type { FastifyInstance } from "fastify";
import { type ZodTypeProvider } from "fastify-type-provider-zod";
import { HealthResponseSchema } from "@idbroker/contracts";

export function registerHealthRoute(
  app: FastifyInstance,
  options: { now: () => Date; version: string }
) {
  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.get(
    "/health",
    {
      schema: {
        response: {
          200: HealthResponseSchema
        }
      }
    },
    async () => ({
      status: "ok" as const,
      timestamp: options.now().toISOString(),
      version: options.version
    })
  );
}
