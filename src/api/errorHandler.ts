/**
 * Global error boundary - catches all unhandled errors.
 * Every error is logged with the request id and answered with clean JSON.
 */
import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";

import { createLogger } from "../logger.js";

const log = createLogger("api");

/**
 * Global error handler for Hono.
 *
 * @param exposeDetails - include the error message in 500 responses
 */
export function createErrorHandler(exposeDetails: boolean): ErrorHandler {
  return (err, c) => {
    const requestId = c.get("requestId") ?? "unknown";

    // Deliberate HTTP errors raised by Hono itself (e.g. malformed requests)
    if (err instanceof HTTPException) {
      log.warn(
        { requestId, status: err.status, path: c.req.path, method: c.req.method },
        `HTTP ${err.status}: ${err.message}`,
      );
      return c.json({ error: err.message, requestId }, err.status);
    }

    log.error(
      {
        operation: "unhandledError",
        requestId,
        error: err.message,
        stack: err.stack,
        path: c.req.path,
        method: c.req.method,
      },
      "❌ Unhandled error",
    );

    return c.json(
      {
        error: exposeDetails ? err.message : "Internal server error",
        requestId,
      },
      500,
    );
  };
}
