/**
 * Hono application assembly: middleware, error boundary and routes.
 * Kept separate from the process entry point so tests can build the app
 * around in-memory collaborators.
 */
import { Hono } from "hono";

import { createErrorHandler } from "./api/errorHandler.js";
import { requestIdMiddleware } from "./api/middleware/requestId.js";
import type { RouteDeps, RouteSettings } from "./api/routes.js";
import { createRoutes } from "./api/routes.js";
import type { Config } from "./config.js";

export type AppDeps = RouteDeps &
  Readonly<{
    /** Include error messages in 500 responses */
    exposeErrorDetails: boolean;
  }>;

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  // Global middleware
  app.use("*", requestIdMiddleware);

  // Error handler
  app.onError(createErrorHandler(deps.exposeErrorDetails));

  app.notFound((c) => c.json({ error: "Not found", requestId: c.get("requestId") }, 404));

  // Mount routes
  app.route("/", createRoutes(deps));

  return app;
}

/**
 * Route defaults taken from the environment configuration.
 */
export function routeSettings(config: Config): RouteSettings {
  return {
    historyPageSize: config.HISTORY_PAGE_SIZE,
    chartWindowMinutes: config.CHART_WINDOW_MINUTES,
    chartBucketCount: config.CHART_BUCKET_COUNT,
    reportWindowHours: config.REPORT_WINDOW_HOURS,
    reportMaxRows: config.REPORT_MAX_ROWS,
    missingValueSentinel: config.MISSING_VALUE_SENTINEL,
  };
}
