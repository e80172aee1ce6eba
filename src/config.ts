/**
 * Typed configuration - all config lives in the environment, parsed with Zod
 * at startup. The process exits immediately on invalid config.
 *
 * Covers:
 * - HTTP server settings
 * - MQTT broker, topics and reconnect backoff
 * - SQLite reading store and write retries
 * - Dashboard chart, history and report defaults
 * - Device control authorization
 */
import { z } from "zod";

/**
 * Parse a comma separated list - empty entries are dropped.
 */
const csvList = (defaultValue: string) =>
  z
    .string()
    .default(defaultValue)
    .transform((val) =>
      val
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item !== ""),
    );

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

export const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().int().positive().default(8083).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("ClassGuard").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // MQTT Configuration
  // ==========================================================================
  MQTT_BROKER_URL: z
    .string()
    .min(1, "MQTT_BROKER_URL is required")
    .default("mqtt://broker.hivemq.com:1883")
    .describe("MQTT broker connection URL"),
  MQTT_CLIENT_ID: optionalString.describe("MQTT client id (random when unset)"),
  MQTT_USERNAME: optionalString.describe("MQTT username"),
  MQTT_PASSWORD: optionalString.describe("MQTT password"),
  MQTT_TOPIC_SENSORS: z
    .string()
    .default("classguard/sensors")
    .describe("Inbound topic carrying sensor readings and device echoes"),
  MQTT_TOPIC_CONTROL: z
    .string()
    .default("classguard/control")
    .describe("Outbound topic for device control commands"),
  MQTT_QOS: z.coerce
    .number()
    .default(1)
    .pipe(z.union([z.literal(0), z.literal(1), z.literal(2)]))
    .describe("QoS for subscribe and publish"),
  MQTT_CONNECT_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(10000)
    .describe("Broker connect timeout (ms)"),
  RECONNECT_BASE_MS: z.coerce
    .number()
    .positive()
    .default(1000)
    .describe("First reconnect delay (ms), doubled per failed attempt"),
  RECONNECT_MAX_MS: z.coerce
    .number()
    .positive()
    .default(60000)
    .describe("Upper bound for the reconnect delay (ms)"),
  CONTROL_QUEUE_LIMIT: z.coerce
    .number()
    .int()
    .positive()
    .default(100)
    .describe("Commands kept while the broker is unreachable"),

  // ==========================================================================
  // Reading Store
  // ==========================================================================
  DATABASE_PATH: z
    .string()
    .default("classguard.db")
    .describe("SQLite file for the reading log (:memory: for ephemeral)"),
  STORE_RETRY_ATTEMPTS: z.coerce
    .number()
    .int()
    .positive()
    .default(3)
    .describe("Append attempts per reading before it is dropped"),
  STORE_RETRY_BASE_MS: z.coerce
    .number()
    .nonnegative()
    .default(200)
    .describe("First append retry delay (ms), doubled per attempt"),

  // ==========================================================================
  // Dashboard Defaults
  // ==========================================================================
  HISTORY_PAGE_SIZE: z.coerce.number().int().positive().default(50),
  CHART_WINDOW_MINUTES: z.coerce.number().positive().default(60),
  CHART_BUCKET_COUNT: z.coerce.number().int().positive().default(12),
  REPORT_WINDOW_HOURS: z.coerce.number().positive().default(24),
  REPORT_MAX_ROWS: z.coerce.number().int().positive().default(50),
  MISSING_VALUE_SENTINEL: z
    .string()
    .default("N/A")
    .describe("Report cell text for a channel that did not report"),

  // ==========================================================================
  // Device Control
  // ==========================================================================
  CONTROL_PRIVILEGED_ROLES: csvList("admin").describe(
    "Roles allowed to issue device commands",
  ),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse an environment map into a typed config.
 */
export function parseConfig(
  env: Record<string, string | undefined>,
): z.SafeParseReturnType<z.input<typeof ConfigSchema>, Config> {
  return ConfigSchema.safeParse(env);
}

// Parse at startup - crashes immediately if invalid
const parsed = parseConfig(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config: Config = parsed.data;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * MQTT topics configuration.
 */
export const mqttTopics = {
  sensors: config.MQTT_TOPIC_SENSORS,
  control: config.MQTT_TOPIC_CONTROL,
} as const;
