/**
 * Codec Module - Transform Tests
 *
 * Unit tests for payload decoding and command encoding.
 */
import { describe, expect, it } from "vitest";

import type { ControlCommand, Reading } from "../schema.js";
import { EMPTY_READING } from "../schema.js";
import {
  decodeReading,
  decodeSensorMessage,
  encodeCommand,
  encodeReading,
  parseTimestamp,
} from "../transform.js";

const now = Date.UTC(2024, 2, 1, 9, 0, 0);

// =============================================================================
// decodeReading Tests
// =============================================================================

describe("decodeReading", () => {
  it("decodes a full payload", () => {
    const payload = JSON.stringify({
      device_id: "esp32-room-1",
      temperature: 24.5,
      humidity: 55.2,
      co2: 820,
      light: 410,
      noise: 48.3,
      aqi: 42,
      class_score: 87,
      status: "Good",
      timestamp: "2024-03-01T08:30:00Z",
    });

    const result = decodeReading(payload, now);

    expect(result._unsafeUnwrap()).toEqual({
      deviceId: "esp32-room-1",
      temperature: 24.5,
      humidity: 55.2,
      co2: 820,
      light: 410,
      noise: 48.3,
      aqi: 42,
      score: 87,
      status: "Good",
      timestamp: Date.UTC(2024, 2, 1, 8, 30, 0),
      receivedAt: now,
    });
  });

  it("leaves unreported channels absent and applies defaults", () => {
    const result = decodeReading(JSON.stringify({ temperature: 21 }), now);

    expect(result._unsafeUnwrap()).toEqual({
      ...EMPTY_READING,
      temperature: 21,
      timestamp: now,
      receivedAt: now,
    });
  });

  it("decodes an empty object to an all-absent reading", () => {
    const reading = decodeReading("{}", now)._unsafeUnwrap();

    expect(reading.temperature).toBeNull();
    expect(reading.score).toBe(0);
    expect(reading.status).toBe("Unknown");
    expect(reading.timestamp).toBe(now);
  });

  it("handles Buffer payload", () => {
    const payload = Buffer.from(JSON.stringify({ co2: 1200 }));

    const result = decodeReading(payload, now);

    expect(result._unsafeUnwrap().co2).toBe(1200);
  });

  it("ignores unknown extra fields", () => {
    const payload = JSON.stringify({ temperature: 22, firmware: "1.4.2" });

    const result = decodeReading(payload, now);

    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap()).not.toHaveProperty("firmware");
  });

  it("accepts numeric strings and drops non-numeric channel values", () => {
    const payload = JSON.stringify({
      temperature: "23.4",
      humidity: "wet",
      noise: null,
      co2: true,
    });

    const reading = decodeReading(payload, now)._unsafeUnwrap();

    expect(reading.temperature).toBe(23.4);
    expect(reading.humidity).toBeNull();
    expect(reading.noise).toBeNull();
    expect(reading.co2).toBeNull();
  });

  it("truncates a fractional class score", () => {
    const reading = decodeReading('{"class_score": 71.9}', now)._unsafeUnwrap();

    expect(reading.score).toBe(71);
  });

  it("falls back to receipt time for an unparsable timestamp", () => {
    const reading = decodeReading(
      '{"temperature": 20, "timestamp": "not-a-date"}',
      now,
    )._unsafeUnwrap();

    expect(reading.timestamp).toBe(now);
  });

  it("returns MALFORMED_PAYLOAD for invalid JSON", () => {
    const result = decodeReading("{temperature: 22", now);

    expect(result._unsafeUnwrapErr().type).toBe("MALFORMED_PAYLOAD");
  });

  it("returns MALFORMED_PAYLOAD for invalid UTF-8", () => {
    const result = decodeReading(Buffer.from([0x7b, 0xff, 0xfe, 0x7d]), now);

    expect(result._unsafeUnwrapErr().type).toBe("MALFORMED_PAYLOAD");
  });

  it("returns MISSING_REQUIRED_FIELD for JSON that is not an object", () => {
    expect(decodeReading("[1, 2, 3]", now)._unsafeUnwrapErr()).toEqual({
      type: "MISSING_REQUIRED_FIELD",
      message: "Expected a JSON object with sensor fields",
      received: "array",
    });
    expect(decodeReading("42", now)._unsafeUnwrapErr().type).toBe(
      "MISSING_REQUIRED_FIELD",
    );
    expect(decodeReading("null", now)._unsafeUnwrapErr().type).toBe(
      "MISSING_REQUIRED_FIELD",
    );
  });
});

// =============================================================================
// decodeSensorMessage Tests
// =============================================================================

describe("decodeSensorMessage", () => {
  it("treats a payload of device booleans as an acknowledgement", () => {
    const result = decodeSensorMessage('{"fan": true, "light": false}', now);

    expect(result._unsafeUnwrap()).toEqual({
      kind: "ack",
      ack: { devices: { fan: true, light: false }, receivedAt: now },
    });
  });

  it("reads a numeric light value as the lux channel", () => {
    const message = decodeSensorMessage('{"light": 350}', now)._unsafeUnwrap();

    expect(message.kind).toBe("reading");
    if (message.kind === "reading") {
      expect(message.reading.light).toBe(350);
      expect(message.ack).toBeNull();
    }
  });

  it("returns a reading that carries device echoes", () => {
    const message = decodeSensorMessage(
      '{"temperature": 26.1, "buzzer": true}',
      now,
    )._unsafeUnwrap();

    expect(message).toEqual({
      kind: "reading",
      reading: { ...EMPTY_READING, temperature: 26.1, timestamp: now, receivedAt: now },
      ack: { devices: { buzzer: true }, receivedAt: now },
    });
  });

  it("propagates decode errors", () => {
    const result = decodeSensorMessage("not json", now);

    expect(result._unsafeUnwrapErr().type).toBe("MALFORMED_PAYLOAD");
  });
});

// =============================================================================
// parseTimestamp Tests
// =============================================================================

describe("parseTimestamp", () => {
  it("reads offset-less date-times as UTC", () => {
    expect(parseTimestamp("2024-03-01T08:30:00", 0)).toBe(1709281800000);
  });

  it("accepts a space between date and time", () => {
    expect(parseTimestamp("2024-03-01 08:30:00", 0)).toBe(1709281800000);
  });

  it("honours an explicit offset", () => {
    expect(parseTimestamp("2024-03-01T10:30:00+02:00", 0)).toBe(1709281800000);
  });

  it("accepts microsecond precision", () => {
    expect(parseTimestamp("2024-03-01T08:30:00.250000", 0)).toBe(
      1709281800250,
    );
  });

  it("returns the fallback for null", () => {
    expect(parseTimestamp(null, 42)).toBe(42);
  });
});

// =============================================================================
// Encoding Tests
// =============================================================================

describe("encodeCommand", () => {
  it("encodes one device per message", () => {
    const command: ControlCommand = {
      device: "fan",
      state: true,
      issuedAt: now,
      issuedBy: "operator-1",
    };

    expect(encodeCommand(command).toString()).toBe('{"fan":true}');
  });

  it("is deterministic", () => {
    const command: ControlCommand = {
      device: "buzzer",
      state: false,
      issuedAt: now,
      issuedBy: "operator-2",
    };

    expect(encodeCommand(command).equals(encodeCommand(command))).toBe(true);
    expect(encodeCommand(command).toString()).toBe('{"buzzer":false}');
  });
});

describe("encodeReading", () => {
  it("round-trips present fields and keeps absent fields absent", () => {
    const reading: Reading = {
      ...EMPTY_READING,
      deviceId: "esp32-room-1",
      temperature: 22.75,
      co2: 640,
      score: 90,
      status: "Good",
      timestamp: Date.UTC(2024, 2, 1, 8, 0, 0),
      receivedAt: now,
    };

    const decoded = decodeReading(encodeReading(reading), now)._unsafeUnwrap();

    expect(decoded).toEqual(reading);
  });
});
