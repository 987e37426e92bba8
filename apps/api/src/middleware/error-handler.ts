import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import {
  DuplicateProductCodeError,
  ImportStateError,
  InventoryValidationError,
  ProductNotFoundError,
} from "@stockroom/core";
import { logger } from "@stockroom/observability";

/**
 * Global error handler
 * Maps domain errors to HTTP status codes; anything else is logged and answered 500
 */
export function handleError(error: unknown, c: Context) {
  if (error instanceof HTTPException) {
    return error.getResponse();
  }
  if (error instanceof InventoryValidationError) {
    return c.json({ error: error.message, issues: error.issues }, 400);
  }
  if (error instanceof ProductNotFoundError) {
    return c.json({ error: error.message }, 404);
  }
  if (error instanceof DuplicateProductCodeError || error instanceof ImportStateError) {
    return c.json({ error: error.message }, 409);
  }

  logger.error({ err: error, requestId: c.get("requestId") }, "Unhandled error");
  return c.json({ error: "Internal server error" }, 500);
}
