/**
 * The subset of the pino logger API the identity core writes to. Fastify's
 * `app.log` satisfies it, so components log through the server's logger.
 */
export interface LoggerLike {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}
