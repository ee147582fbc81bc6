/**
 * Minimal logger contract. Fastify's `app.log` satisfies it, so services
 * can be handed the request-scoped pino logger or the console default.
 */

export interface Logger {
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
  debug?: (obj: unknown, msg?: string) => void;
}

export const defaultLogger: Logger = {
  info: (obj, msg) => console.log(`[INFO] ${msg || ''}`, obj),
  warn: (obj, msg) => console.warn(`[WARN] ${msg || ''}`, obj),
  error: (obj, msg) => console.error(`[ERROR] ${msg || ''}`, obj),
  debug: (obj, msg) => console.debug(`[DEBUG] ${msg || ''}`, obj),
};
