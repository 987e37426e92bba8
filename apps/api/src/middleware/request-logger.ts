import type { Context, Next } from "hono";
import { logger } from "@stockroom/observability";

const httpLogger = logger.child({ module: "http" });

/**
 * One log line per request: method, path, status, duration
 */
export async function requestLoggerMiddleware(c: Context, next: Next) {
  const startedAt = performance.now();

  await next();

  const entry = {
    requestId: c.get("requestId"),
    method: c.req.method,
    path: c.req.path,
    status: c.res.status,
    durationMs: Math.round(performance.now() - startedAt),
  };

  if (c.res.status >= 500) {
    httpLogger.error(entry, "Request failed");
  } else {
    httpLogger.info(entry, "Request completed");
  }
}
