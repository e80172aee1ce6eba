/**
 * Control Module - Service Tests
 */
import { type Mock, beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import type { LatestStateCache } from "../../cache/index.js";
import { createLatestStateCache } from "../../cache/index.js";
import { formatControlError, validationFailed } from "../errors.js";
import { ControlRequestSchema } from "../schema.js";
import { createControlDispatcher } from "../service.js";

const ISSUED_AT = Date.UTC(2024, 2, 1, 9, 0, 0);

describe("Control Dispatcher", () => {
  let cache: LatestStateCache;
  let publish: Mock<(topic: string, payload: Buffer) => void>;

  function dispatcher() {
    return createControlDispatcher({
      cache,
      publisher: { publish },
      controlTopic: "classguard/control",
      privilegedRoles: ["admin", "teacher"],
      now: () => ISSUED_AT,
    });
  }

  beforeEach(() => {
    cache = createLatestStateCache();
    publish = vi.fn<(topic: string, payload: Buffer) => void>();
  });

  test("rejects a viewer with UNAUTHORIZED", () => {
    const result = dispatcher().issue("fan", true, { role: "viewer" });

    expect(result._unsafeUnwrapErr().type).toBe("UNAUTHORIZED");
    expect(publish).not.toHaveBeenCalled();
    expect(cache.get().devices.fan).toBe(false);
  });

  test("checks the role before the device", () => {
    const result = dispatcher().issue("heater", true, { role: "viewer" });

    expect(result._unsafeUnwrapErr().type).toBe("UNAUTHORIZED");
  });

  test("rejects an unknown device with INVALID_DEVICE", () => {
    const result = dispatcher().issue("heater", true, { role: "admin" });

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe("INVALID_DEVICE");
    expect(formatControlError(error)).toBe('Invalid device: Unknown device "heater"');
    expect(publish).not.toHaveBeenCalled();
  });

  test("applies the state to the cache before any echo", () => {
    const result = dispatcher().issue("fan", true, { role: "admin", id: "ms-jansen" });

    expect(result._unsafeUnwrap()).toEqual({
      device: "fan",
      state: true,
      issuedAt: ISSUED_AT,
      issuedBy: "ms-jansen",
    });
    expect(cache.get().devices).toEqual({ fan: true, light: false, buzzer: false });
  });

  test("publishes the encoded command on the control topic", () => {
    dispatcher().issue("buzzer", false, { role: "teacher" });

    expect(publish).toHaveBeenCalledTimes(1);
    const [topic, payload] = publish.mock.calls[0] ?? [];
    expect(topic).toBe("classguard/control");
    expect(String(payload)).toBe('{"buzzer":false}');
  });

  test("falls back to the role as issuer when no id is given", () => {
    const result = dispatcher().issue("light", true, { role: "admin" });

    expect(result._unsafeUnwrap().issuedBy).toBe("admin");
  });
});

describe("ControlRequestSchema", () => {
  test("accepts a device and boolean state", () => {
    expect(ControlRequestSchema.parse({ device: "fan", state: true })).toEqual({
      device: "fan",
      state: true,
    });
  });

  test("rejects non-boolean states", () => {
    expect(ControlRequestSchema.safeParse({ device: "fan", state: "on" }).success).toBe(
      false,
    );
  });

  test("formats validation failures with their issues", () => {
    expect(formatControlError(validationFailed("Invalid body", ["state: Required"]))).toBe(
      "Validation failed: Invalid body (state: Required)",
    );
  });
});
