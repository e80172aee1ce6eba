/**
 * Classroom Telemetry Core - Application Entry Point
 *
 * Wires the long-lived pieces together:
 * - SQLite reading store and the latest-state cache seeded from it
 * - MQTT ingestion subscriber (reconnects on its own)
 * - Control dispatcher publishing through the subscriber
 * - SSE hub fed by cache and connection changes
 * - Hono HTTP server on @hono/node-server
 */
import { serve } from "@hono/node-server";

import { createApp, routeSettings } from "./app.js";
import { createLatestStateCache } from "./cache/index.js";
import type { LatestSnapshot } from "./cache/index.js";
import { INITIAL_DEVICE_STATUS } from "./codec/index.js";
import { config, mqttTopics } from "./config.js";
import { createControlDispatcher } from "./control/index.js";
import { createLogger, logOperationFailed } from "./logger.js";
import {
  createIngestionSubscriber,
  createMqttTransport,
  redactBrokerUrl,
} from "./mqtt/index.js";
import { bridgeLiveEvents, createSseHub } from "./sse/index.js";
import type { ReadingStore } from "./store/index.js";
import { createSqliteReadingStore } from "./store/index.js";

const log = createLogger("app");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log(`  ${config.APP_NAME.toUpperCase()} TELEMETRY CORE`);
console.log("========================================");
console.log("");

// Log configuration summary (non-sensitive values only)
log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    mqttBroker: redactBrokerUrl(config.MQTT_BROKER_URL),
    sensorTopic: mqttTopics.sensors,
    controlTopic: mqttTopics.control,
    qos: config.MQTT_QOS,
    databasePath: config.DATABASE_PATH,
    privilegedRoles: config.CONTROL_PRIVILEGED_ROLES,
  },
  "Configuration loaded",
);

// =============================================================================
// CORE COMPONENTS
// =============================================================================

function initialSnapshot(store: ReadingStore): LatestSnapshot | undefined {
  const latest = store.latest();
  if (!latest) {
    log.info("Reading store is empty, cache starts blank");
    return undefined;
  }

  const { id, ...reading } = latest;
  log.info({ id, timestamp: reading.timestamp }, "Cache seeded from latest stored reading");
  return { reading, devices: INITIAL_DEVICE_STATUS, version: 0 };
}

const store = createSqliteReadingStore(config.DATABASE_PATH);
const cache = createLatestStateCache(initialSnapshot(store));

const subscriber = createIngestionSubscriber({
  transport: createMqttTransport({
    brokerUrl: config.MQTT_BROKER_URL,
    clientId: config.MQTT_CLIENT_ID,
    username: config.MQTT_USERNAME,
    password: config.MQTT_PASSWORD,
    connectTimeoutMs: config.MQTT_CONNECT_TIMEOUT_MS,
  }),
  cache,
  store,
  sensorTopic: mqttTopics.sensors,
  qos: config.MQTT_QOS,
  reconnect: { baseMs: config.RECONNECT_BASE_MS, maxMs: config.RECONNECT_MAX_MS },
  storeRetry: { attempts: config.STORE_RETRY_ATTEMPTS, baseMs: config.STORE_RETRY_BASE_MS },
  controlQueueLimit: config.CONTROL_QUEUE_LIMIT,
});

const dispatcher = createControlDispatcher({
  cache,
  publisher: subscriber,
  controlTopic: mqttTopics.control,
  privilegedRoles: config.CONTROL_PRIVILEGED_ROLES,
});

const hub = createSseHub();
const detachLiveEvents = bridgeLiveEvents(hub, cache, subscriber);

// =============================================================================
// HONO SERVER SETUP
// =============================================================================

const app = createApp({
  cache,
  store,
  dispatcher,
  subscriber,
  hub,
  settings: routeSettings(config),
  exposeErrorDetails: config.NODE_ENV !== "production",
});

subscriber.start();

const server = serve(
  {
    fetch: app.fetch,
    port: config.PORT,
    hostname: "0.0.0.0", // Bind to all interfaces for remote access
  },
  (info) => {
    log.info(
      { port: info.port, env: config.NODE_ENV, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on port ${info.port}`,
    );
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

let shuttingDown = false;

function closeServer(): Promise<void> {
  return new Promise((resolve) => {
    server.close((error) => {
      if (error) {
        log.warn({ error: error.message }, "HTTP server did not close cleanly");
      }
      resolve();
    });
  });
}

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  // SSE streams hold their connections open; end them before closing
  detachLiveEvents();
  hub.disconnectAllClients();

  await closeServer();
  await subscriber.stop();
  store.close();

  log.info("Shutdown complete");
}

function onSignal(signal: string): void {
  shutdown(signal)
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logOperationFailed(log, "shutdown", error);
      store.close();
      process.exit(1);
    });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
