/**
 * Codec Module - Schemas and Types
 *
 * Data shapes shared by the ingestion, store, control and report paths.
 * Inbound payload schemas are lenient: a syntactically valid JSON object
 * always maps to a Reading, bad channel values simply become absent.
 */
import { z } from "zod";

// =============================================================================
// Devices
// =============================================================================

/**
 * Closed set of controllable devices.
 */
export const DEVICE_NAMES = ["fan", "light", "buzzer"] as const;

export type DeviceName = (typeof DEVICE_NAMES)[number];

/**
 * On/off state of every device.
 */
export type DeviceStatus = Readonly<Record<DeviceName, boolean>>;

export const INITIAL_DEVICE_STATUS: DeviceStatus = {
  fan: false,
  light: false,
  buzzer: false,
};

export function isDeviceName(value: string): value is DeviceName {
  return DEVICE_NAMES.some((name) => name === value);
}

// =============================================================================
// Reading
// =============================================================================

/**
 * Numeric sensor channels. `null` means the channel did not report.
 */
export const CHANNELS = [
  "temperature",
  "humidity",
  "co2",
  "light",
  "noise",
  "aqi",
] as const;

export type Channel = (typeof CHANNELS)[number];

/**
 * One decoded telemetry sample.
 */
export type Reading = Readonly<{
  /** Reporting device, null when the payload carried none */
  deviceId: string | null;
  /** °C */
  temperature: number | null;
  /** Relative humidity % */
  humidity: number | null;
  /** ppm */
  co2: number | null;
  /** lux */
  light: number | null;
  /** dB */
  noise: number | null;
  /** Air quality index */
  aqi: number | null;
  /** Class comfort score computed on the sensor */
  score: number;
  /** Short classification label */
  status: string;
  /** Sample time in epoch ms (receipt time when the payload had none) */
  timestamp: number;
  /** Server receipt time in epoch ms */
  receivedAt: number;
}>;

export const DEFAULT_STATUS = "Unknown";

/**
 * Reading held by the cache before anything has been received.
 */
export const EMPTY_READING: Reading = {
  deviceId: null,
  temperature: null,
  humidity: null,
  co2: null,
  light: null,
  noise: null,
  aqi: null,
  score: 0,
  status: DEFAULT_STATUS,
  timestamp: 0,
  receivedAt: 0,
};

// =============================================================================
// Control
// =============================================================================

/**
 * Outbound instruction to switch a device.
 */
export type ControlCommand = Readonly<{
  device: DeviceName;
  state: boolean;
  issuedAt: number;
  issuedBy: string;
}>;

/**
 * Device states echoed back by the room controller on the sensor topic.
 */
export type ControlAck = Readonly<{
  devices: Readonly<Partial<Record<DeviceName, boolean>>>;
  receivedAt: number;
}>;

/**
 * A decoded sensor-topic message: a reading (optionally carrying device
 * echoes) or a bare acknowledgement.
 */
export type SensorMessage =
  | { readonly kind: "reading"; readonly reading: Reading; readonly ack: ControlAck | null }
  | { readonly kind: "ack"; readonly ack: ControlAck };

// =============================================================================
// Sensor Payload
// =============================================================================

/**
 * Numeric value or numeric string; anything else is treated as absent.
 */
const ChannelValueSchema = z
  .union([z.number(), z.string().trim().min(1)])
  .pipe(z.coerce.number().finite())
  .nullish()
  .catch(null)
  .transform((val) => val ?? null);

/**
 * Raw sensor-topic payload.
 * Topic: classguard/sensors
 */
export const SensorPayloadSchema = z.object({
  device_id: z
    .union([z.string(), z.number().transform(String)])
    .nullish()
    .catch(null)
    .transform((val) => val ?? null)
    .describe("Reporting device id"),
  temperature: ChannelValueSchema.describe("Temperature in °C"),
  humidity: ChannelValueSchema.describe("Relative humidity %"),
  co2: ChannelValueSchema.describe("CO2 in ppm"),
  light: ChannelValueSchema.describe("Illuminance in lux"),
  noise: ChannelValueSchema.describe("Noise level in dB"),
  aqi: ChannelValueSchema.describe("Air quality index"),
  class_score: z
    .union([z.number(), z.string().trim().min(1)])
    .pipe(z.coerce.number().finite())
    .transform(Math.trunc)
    .catch(0)
    .describe("Class comfort score"),
  status: z
    .string()
    .nullish()
    .catch(null)
    .transform((val) => val ?? DEFAULT_STATUS)
    .describe("Classification label"),
  timestamp: z
    .string()
    .nullish()
    .catch(null)
    .transform((val) => val ?? null)
    .describe("ISO-8601 sample time"),
});

export type SensorPayload = z.infer<typeof SensorPayloadSchema>;

/**
 * Device echoes: booleans keyed by device name.
 * A boolean `light` is the light relay, a number is the lux channel.
 */
export const DeviceEchoSchema = z.object({
  fan: z.boolean().optional().catch(undefined),
  light: z.boolean().optional().catch(undefined),
  buzzer: z.boolean().optional().catch(undefined),
});

/**
 * Payload keys that make a message a reading rather than a bare echo.
 */
export const READING_KEYS: ReadonlyArray<string> = [
  "device_id",
  "temperature",
  "humidity",
  "co2",
  "noise",
  "aqi",
  "class_score",
  "status",
  "timestamp",
];
