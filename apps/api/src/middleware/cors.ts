import { cors } from "hono/cors";
import { SESSION_HEADER } from "./session.js";

export function computeAllowedOrigins(webAppUrl: string): Set<string> {
  const allowed = new Set<string>([webAppUrl]);
  const url = new URL(webAppUrl);
  const port = url.port ? `:${url.port}` : "";

  if (url.hostname.startsWith("www.")) {
    allowed.add(`${url.protocol}//${url.hostname.replace(/^www\./, "")}${port}`);
  } else if (!url.hostname.includes("localhost")) {
    allowed.add(`${url.protocol}//www.${url.hostname}${port}`);
  }

  return allowed;
}

/**
 * CORS for the dashboard front end: the configured web app URL (and its www variant)
 * plus any localhost port during development
 */
export function corsMiddleware(webAppUrl: string) {
  const allowedOrigins = computeAllowedOrigins(webAppUrl);

  return cors({
    origin: (origin) => {
      if (origin && allowedOrigins.has(origin)) {
        return origin;
      }
      if (origin && /^http:\/\/localhost:\d+$/.test(origin)) {
        return origin;
      }
      return "";
    },
    allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
    allowHeaders: ["Content-Type", "X-Request-Id", SESSION_HEADER],
    exposeHeaders: ["X-Request-Id", "Content-Disposition"],
    maxAge: 86400, // 24 hours - browser caches preflight response
  });
}
