import type { AuthenticatedContext } from "./request-authenticator.js";

declare module "fastify" {
  interface FastifyRequest {
    auth?: AuthenticatedContext;
  }
}
