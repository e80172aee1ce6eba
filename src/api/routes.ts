/**
 * API routes for the classroom telemetry core.
 *
 * Routes are organized by domain:
 * - /api/health, /api/version - Health check
 * - /api/latest, /api/history, /api/chart - Readings
 * - /api/control - Device commands
 * - /api/report, /api/report.csv - Tabular reports
 * - /api/stats - Ingestion counters
 * - /api/events - SSE stream for real-time updates
 *
 * The presentation layer (HTML, login, PDF layout) consumes these; none of
 * it lives here.
 */
import { Hono } from "hono";
import type { Context } from "hono";
import { streamSSE } from "hono/streaming";
import { z } from "zod";

import { chartSeries } from "../aggregation/index.js";
import type { LatestStateCache } from "../cache/index.js";
import type { ControlDispatcher, ControlError } from "../control/index.js";
import {
  ControlRequestSchema,
  formatControlError,
  validationFailed,
} from "../control/index.js";
import { createLogger } from "../logger.js";
import type { IngestionSubscriber } from "../mqtt/index.js";
import { buildReport, reportToCsv } from "../report/index.js";
import type { SseHub } from "../sse/index.js";
import { systemStateEvent } from "../sse/index.js";
import type { ReadingStore } from "../store/index.js";

const log = createLogger("api");

export const APP_VERSION = "1.0.0";

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

// =============================================================================
// Dependencies
// =============================================================================

export type RouteSettings = Readonly<{
  historyPageSize: number;
  chartWindowMinutes: number;
  chartBucketCount: number;
  reportWindowHours: number;
  reportMaxRows: number;
  missingValueSentinel: string;
}>;

export type RouteDeps = Readonly<{
  cache: LatestStateCache;
  store: ReadingStore;
  dispatcher: ControlDispatcher;
  subscriber: Pick<IngestionSubscriber, "getState" | "getStats">;
  hub: SseHub;
  settings: RouteSettings;
  now?: () => number;
}>;

// =============================================================================
// Query Schemas
// =============================================================================

const HistoryQuerySchema = z.object({
  date: z.string().optional(),
  page: z.coerce.number().int().default(1),
  pageSize: z.coerce.number().int().min(1).max(500).optional(),
});

const ChartQuerySchema = z.object({
  windowMinutes: z.coerce.number().positive().max(60 * 24 * 31).optional(),
  buckets: z.coerce.number().int().min(1).max(1000).optional(),
});

const ReportQuerySchema = z.object({
  windowHours: z.coerce.number().positive().max(24 * 366).optional(),
  maxRows: z.coerce.number().int().min(1).max(10_000).optional(),
});

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`);
}

function controlErrorStatus(error: ControlError): 400 | 403 {
  return error.type === "UNAUTHORIZED" ? 403 : 400;
}

function validationResponse(c: Context, error: ControlError) {
  return c.json(
    {
      success: false,
      error: error.type,
      message: formatControlError(error),
      requestId: c.get("requestId"),
    },
    controlErrorStatus(error),
  );
}

// =============================================================================
// Routes
// =============================================================================

export function createRoutes(deps: RouteDeps): Hono {
  const { cache, store, dispatcher, subscriber, hub, settings } = deps;
  const now = deps.now ?? Date.now;
  const routes = new Hono();

  // ===========================================================================
  // Health Check
  // ===========================================================================

  /**
   * Health endpoint - returns system status.
   */
  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date(now()).toISOString(),
      requestId,
      version: APP_VERSION,
      broker: subscriber.getState(),
      readings: store.count(),
      sseClients: hub.getClientCount(),
    });
  });

  routes.get("/api/version", (c) => {
    return c.json({ version: APP_VERSION });
  });

  // ===========================================================================
  // Readings
  // ===========================================================================

  /**
   * Latest reading and device states from the cache.
   */
  routes.get("/api/latest", (c) => {
    const snapshot = cache.get();
    return c.json({
      reading: snapshot.reading,
      devices: snapshot.devices,
      connection: subscriber.getState(),
    });
  });

  /**
   * Newest-first history page, optionally restricted to one UTC day.
   */
  routes.get("/api/history", (c) => {
    const requestId = c.get("requestId");
    const parsed = HistoryQuerySchema.safeParse(c.req.query());

    if (!parsed.success) {
      return validationResponse(
        c,
        validationFailed("Invalid history query", issuesOf(parsed.error)),
      );
    }

    const { date, page } = parsed.data;
    const pageSize = parsed.data.pageSize ?? settings.historyPageSize;
    log.debug({ requestId, date, page, pageSize }, "GET /api/history");

    return c.json(store.query(date ? { date } : {}, page, pageSize));
  });

  /**
   * Bucketed chart series over the trailing window.
   */
  routes.get("/api/chart", (c) => {
    const parsed = ChartQuerySchema.safeParse(c.req.query());

    if (!parsed.success) {
      return validationResponse(
        c,
        validationFailed("Invalid chart query", issuesOf(parsed.error)),
      );
    }

    const windowMinutes = parsed.data.windowMinutes ?? settings.chartWindowMinutes;
    const bucketCount = parsed.data.buckets ?? settings.chartBucketCount;
    const windowMs = Math.round(windowMinutes * MINUTE_MS);
    const at = now();

    return c.json({
      windowMinutes,
      bucketCount,
      until: at,
      buckets: chartSeries(store, windowMs, bucketCount, at),
    });
  });

  // ===========================================================================
  // Device Control
  // ===========================================================================

  /**
   * Switch a device. The role comes from the auth collaborator in
   * `x-actor-role`; the operator id, when known, in `x-actor-id`.
   */
  routes.post("/api/control", async (c) => {
    const requestId = c.get("requestId");

    let body: unknown;
    try {
      body = await c.req.json<unknown>();
    } catch (error) {
      log.debug(
        { requestId, error: error instanceof Error ? error.message : String(error) },
        "Control body is not JSON",
      );
      return validationResponse(c, validationFailed("Request body must be JSON"));
    }

    const parsed = ControlRequestSchema.safeParse(body);
    if (!parsed.success) {
      return validationResponse(
        c,
        validationFailed("Invalid control request", issuesOf(parsed.error)),
      );
    }

    const role = c.req.header("x-actor-role") ?? "anonymous";
    const id = c.req.header("x-actor-id");
    const result = dispatcher.issue(parsed.data.device, parsed.data.state, {
      role,
      ...(id ? { id } : {}),
    });

    if (result.isErr()) {
      return validationResponse(c, result.error);
    }

    log.info({ requestId, device: result.value.device, state: result.value.state }, "Command issued");

    return c.json({
      success: true,
      command: result.value,
      devices: cache.get().devices,
      requestId,
    });
  });

  // ===========================================================================
  // Reports
  // ===========================================================================

  function reportFor(c: Context) {
    const parsed = ReportQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return { ok: false as const, error: parsed.error };
    }

    const windowHours = parsed.data.windowHours ?? settings.reportWindowHours;
    const maxRows = parsed.data.maxRows ?? settings.reportMaxRows;
    const until = now();
    const since = until - Math.round(windowHours * HOUR_MS);

    return {
      ok: true as const,
      report: buildReport(store, since, until, maxRows, {
        sentinel: settings.missingValueSentinel,
        now: until,
      }),
    };
  }

  routes.get("/api/report", (c) => {
    const result = reportFor(c);
    if (!result.ok) {
      return validationResponse(c, validationFailed("Invalid report query", issuesOf(result.error)));
    }
    return c.json(result.report);
  });

  routes.get("/api/report.csv", (c) => {
    const result = reportFor(c);
    if (!result.ok) {
      return validationResponse(c, validationFailed("Invalid report query", issuesOf(result.error)));
    }

    c.header("Content-Type", "text/csv; charset=utf-8");
    c.header("Content-Disposition", 'attachment; filename="classroom-report.csv"');
    return c.body(reportToCsv(result.report));
  });

  // ===========================================================================
  // Stats
  // ===========================================================================

  routes.get("/api/stats", (c) => {
    return c.json({
      subscriber: subscriber.getStats(),
      store: { readings: store.count() },
      sseClients: hub.getClientCount(),
    });
  });

  // ===========================================================================
  // Server-Sent Events Stream
  // ===========================================================================

  /**
   * SSE endpoint for real-time updates.
   * New clients get a `system_state` snapshot, then live changes.
   */
  routes.get("/api/events", (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId }, "SSE client connecting");

    return streamSSE(c, async (stream) => {
      await new Promise<void>((resolve) => {
        const clientId = hub.addClient({
          write: (message) => stream.writeSSE(message),
          close: resolve,
        });

        stream.onAbort(() => {
          hub.removeClient(clientId);
          resolve();
        });

        hub.sendToClient(clientId, systemStateEvent(cache.get(), subscriber.getState()));
      });
    });
  });

  return routes;
}
