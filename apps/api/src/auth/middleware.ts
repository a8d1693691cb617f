import type { FastifyReply, FastifyRequest } from "fastify";
import { BrokerError, invalidToken, permissionDenied } from "./errors.js";
import type { AuthenticatedContext, RequestAuthenticator } from "./request-authenticator.js";

export function replyWithBrokerError(
  request: FastifyRequest,
  reply: FastifyReply,
  error: BrokerError
) {
  return reply.status(error.statusCode).send({
    code: error.code,
    message: error.message,
    requestId: request.id
  });
}

export function buildAuthPreHandler(deps: { authenticator: RequestAuthenticator }) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      request.auth = await deps.authenticator.authenticate(request.headers.authorization);
    } catch (error) {
      if (error instanceof BrokerError) {
        if (error.statusCode >= 500) {
          request.log.error({ err: error }, "Authentication dependency failed");
        } else {
          request.log.info({ code: error.code }, "Request authentication rejected");
        }
        return replyWithBrokerError(request, reply, error);
      }

      request.log.error({ err: error }, "Authentication pre-handler failed");
      return replyWithBrokerError(request, reply, invalidToken("Authentication failed"));
    }
  };
}

/** Requires an app role on the already authenticated caller. */
export function buildRolePreHandler(role: string) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const auth = request.auth;
    if (!auth) {
      return replyWithBrokerError(request, reply, invalidToken("Route requires authentication"));
    }

    if (!auth.principal.roles.has(role)) {
      return replyWithBrokerError(
        request,
        reply,
        permissionDenied(`Missing required role: ${role}`)
      );
    }
  };
}

export function getRequestAuth(request: FastifyRequest): AuthenticatedContext {
  if (!request.auth) {
    throw invalidToken("Route requires authenticated context");
  }

  return request.auth;
}

export function wrapAsyncPreHandler(
  handler: (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>
) {
  return (request: FastifyRequest, reply: FastifyReply, done: (error?: Error) => void) => {
    void handler(request, reply).then(
      () => done(),
      (error) => done(error instanceof Error ? error : new Error(String(error)))
    );
  };
}
