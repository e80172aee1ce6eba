/**
 * Module-scoped color-coded loggers.
 *
 * Each module gets its own named logger with an assigned color so the
 * ingestion, store and control paths are easy to tell apart in dev logs.
 */
import pino from "pino";
import { config } from "./config.js";

/**
 * Module color assignments (ANSI escape codes).
 */
const MODULE_COLORS = {
  // Core
  app: "\x1b[33m", // yellow
  api: "\x1b[34m", // blue

  // Ingestion path
  mqtt: "\x1b[91m", // bright red
  cache: "\x1b[36m", // cyan
  store: "\x1b[35m", // magenta

  // Read and control paths
  aggregation: "\x1b[32m", // green
  control: "\x1b[95m", // bright magenta
  report: "\x1b[92m", // bright green
  sse: "\x1b[94m", // bright blue

  // Infrastructure
  middleware: "\x1b[90m", // gray
} as const;

const RESET = "\x1b[0m";

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

export type Logger = pino.Logger;

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @example
 * const log = createLogger("mqtt");
 * log.info({ topic }, "Subscribed to topic");
 */
export function createLogger(module: ModuleName): Logger {
  const color = MODULE_COLORS[module];

  if (config.NODE_ENV === "development") {
    return pino({
      name: module,
      level: config.LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          messageFormat: `${color}[{name}]${RESET} {msg}`,
          ignore: "pid,hostname",
          translateTime: "HH:MM:ss",
        },
      },
    });
  }

  // Structured JSON for production
  return pino({
    name: module,
    level: config.LOG_LEVEL,
  });
}

/**
 * Log operation entry with consistent format.
 */
export function logOperationStart(
  logger: Logger,
  operation: string,
  context: Record<string, unknown> = {},
): void {
  logger.info({ operation, ...context }, `→ ${operation} started`);
}

/**
 * Log operation completion with duration.
 */
export function logOperationComplete(
  logger: Logger,
  operation: string,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.info(
    { operation, durationMs, ...context },
    `✓ ${operation} completed (${durationMs}ms)`,
  );
}

/**
 * Log operation failure with error details.
 */
export function logOperationFailed(
  logger: Logger,
  operation: string,
  error: unknown,
  context: Record<string, unknown> = {},
): void {
  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.error(
    { operation, error: errorMessage, ...context },
    `✗ ${operation} failed: ${errorMessage}`,
  );
}
