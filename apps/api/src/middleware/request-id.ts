import type { Context, Next } from "hono";
import { randomUUID } from "node:crypto";

/**
 * Request ID middleware
 * Reuses an upstream x-request-id / x-correlation-id or generates one,
 * attaches it to the context, and echoes it on the response.
 * Every log line for the request carries it.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const upstream = c.req.header("x-request-id") || c.req.header("x-correlation-id");
  const requestId = upstream && upstream.length <= 128 ? upstream : randomUUID();

  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  await next();
}
