/**
 * Codec Module - Pure Transformations
 *
 * Bytes in, typed values out (and back). No I/O, no clock: the receipt time
 * is passed in by the caller.
 */
import { type Result, err, ok } from "neverthrow";

import type { DecodeError } from "./errors.js";
import { malformedPayload, missingRequiredField } from "./errors.js";
import type {
  ControlAck,
  ControlCommand,
  DeviceName,
  Reading,
  SensorMessage,
} from "./schema.js";
import {
  DEVICE_NAMES,
  DeviceEchoSchema,
  READING_KEYS,
  SensorPayloadSchema,
} from "./schema.js";

// =============================================================================
// Payload Parsing
// =============================================================================

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Parse raw payload bytes as a JSON object.
 */
function parseJsonObject(
  payload: Uint8Array | string,
): Result<Record<string, unknown>, DecodeError> {
  let text: string;
  try {
    text = typeof payload === "string" ? payload : utf8.decode(payload);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(malformedPayload("Payload is not valid UTF-8", cause));
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(malformedPayload("Payload is not valid JSON", cause));
  }

  if (!isRecord(data)) {
    return err(
      missingRequiredField(
        "Expected a JSON object with sensor fields",
        describeJsonType(data),
      ),
    );
  }

  return ok(data);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeJsonType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

// =============================================================================
// Timestamp Parsing
// =============================================================================

const HAS_OFFSET = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Parse an ISO-8601 timestamp into epoch ms.
 *
 * Date-times without an offset are read as UTC, the way the sensors publish
 * them. Returns `fallback` for missing or unparsable values.
 *
 * @example
 * parseTimestamp("2024-03-01T08:30:00", 0) // 1709281800000
 * parseTimestamp("yesterday", 42) // 42
 */
export function parseTimestamp(value: string | null, fallback: number): number {
  if (value === null) {
    return fallback;
  }

  let normalized = value.trim().replace(" ", "T");
  if (normalized.includes("T") && !HAS_OFFSET.test(normalized)) {
    normalized = `${normalized}Z`;
  }

  const parsed = Date.parse(normalized);
  return Number.isNaN(parsed) ? fallback : parsed;
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Map a parsed JSON object onto a Reading.
 */
function toReading(data: Record<string, unknown>, receivedAt: number): Reading {
  // Object input never fails: every field carries a .catch()
  const fields = SensorPayloadSchema.parse(data);

  return {
    deviceId: fields.device_id,
    temperature: fields.temperature,
    humidity: fields.humidity,
    co2: fields.co2,
    light: fields.light,
    noise: fields.noise,
    aqi: fields.aqi,
    score: fields.class_score,
    status: fields.status,
    timestamp: parseTimestamp(fields.timestamp, receivedAt),
    receivedAt,
  };
}

/**
 * Extract boolean device echoes, or null when the payload carries none.
 */
function toAck(
  data: Record<string, unknown>,
  receivedAt: number,
): ControlAck | null {
  const echo = DeviceEchoSchema.parse(data);
  const devices: Partial<Record<DeviceName, boolean>> = {};

  for (const name of DEVICE_NAMES) {
    const state = echo[name];
    if (state !== undefined) {
      devices[name] = state;
    }
  }

  if (Object.keys(devices).length === 0) {
    return null;
  }

  return { devices, receivedAt };
}

function hasReadingFields(data: Record<string, unknown>): boolean {
  if (READING_KEYS.some((key) => data[key] !== undefined)) {
    return true;
  }
  // A non-boolean light value is the lux channel
  return data.light !== undefined && typeof data.light !== "boolean";
}

/**
 * Decode a sensor payload into a Reading.
 *
 * @param payload - Raw message payload (bytes or string)
 * @param receivedAt - Receipt time in epoch ms, also the fallback timestamp
 *
 * @example
 * decodeReading('{"temperature": 22.5}', now)
 * // ok({ temperature: 22.5, humidity: null, ..., timestamp: now })
 */
export function decodeReading(
  payload: Uint8Array | string,
  receivedAt: number,
): Result<Reading, DecodeError> {
  return parseJsonObject(payload).map((data) => toReading(data, receivedAt));
}

/**
 * Decode a sensor-topic message into a reading or a bare device echo.
 *
 * `{"fan": true}` is an acknowledgement; `{"temperature": 24, "fan": true}`
 * is a reading that also carries an acknowledgement.
 */
export function decodeSensorMessage(
  payload: Uint8Array | string,
  receivedAt: number,
): Result<SensorMessage, DecodeError> {
  return parseJsonObject(payload).map((data): SensorMessage => {
    const ack = toAck(data, receivedAt);

    if (ack !== null && !hasReadingFields(data)) {
      return { kind: "ack", ack };
    }

    return { kind: "reading", reading: toReading(data, receivedAt), ack };
  });
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Encode a control command as `{"<device>": <state>}`.
 *
 * @example
 * encodeCommand({ device: "fan", state: true, ... }).toString() // '{"fan":true}'
 */
export function encodeCommand(command: ControlCommand): Buffer {
  return Buffer.from(JSON.stringify({ [command.device]: command.state }));
}

/**
 * Encode a reading in the sensor-topic wire format.
 * Absent channels are omitted.
 */
export function encodeReading(reading: Reading): Buffer {
  const payload: Record<string, string | number> = {};

  if (reading.deviceId !== null) payload.device_id = reading.deviceId;
  if (reading.temperature !== null) payload.temperature = reading.temperature;
  if (reading.humidity !== null) payload.humidity = reading.humidity;
  if (reading.co2 !== null) payload.co2 = reading.co2;
  if (reading.light !== null) payload.light = reading.light;
  if (reading.noise !== null) payload.noise = reading.noise;
  if (reading.aqi !== null) payload.aqi = reading.aqi;

  payload.class_score = reading.score;
  payload.status = reading.status;
  payload.timestamp = new Date(reading.timestamp).toISOString();

  return Buffer.from(JSON.stringify(payload));
}
