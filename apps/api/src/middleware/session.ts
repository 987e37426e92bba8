import type { Context, Next } from "hono";
import type { SessionRegistry } from "../lib/session-registry.js";

export const SESSION_HEADER = "x-session-id";

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

/**
 * Session id from the request header, or null when missing or malformed
 */
export function readSessionId(c: Context): string | null {
  const sessionId = c.req.header(SESSION_HEADER)?.trim();
  return sessionId && SESSION_ID_PATTERN.test(sessionId) ? sessionId : null;
}

export function missingSessionResponse(c: Context) {
  return c.json(
    { error: `A ${SESSION_HEADER} header of 1-128 letters, digits, "-" or "_" is required` },
    400
  );
}

/**
 * Session middleware
 * Attaches the caller's inventory session (created on first use) as c.var.inventory
 */
export function sessionMiddleware(registry: SessionRegistry) {
  return async (c: Context, next: Next) => {
    const sessionId = readSessionId(c);
    if (!sessionId) {
      return missingSessionResponse(c);
    }

    c.set("inventory", registry.acquire(sessionId));
    await next();
  };
}
