/**
 * SSE Service Tests
 *
 * Tests SSE client management, broadcasting and live event wiring.
 */
import { beforeEach, describe, expect, test, vi } from "vitest";

// Mock logger
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
  logOperationFailed: vi.fn(),
}));

// Import after mocks
import { createLatestStateCache } from "../../cache/index.js";
import { EMPTY_READING } from "../../codec/index.js";
import type { StateListener } from "../../mqtt/index.js";
import type { SseMessage, SseSink } from "../schema.js";
import type { SseHub } from "../service.js";
import { bridgeLiveEvents, createSseHub } from "../service.js";

type RecordingSink = SseSink & {
  messages: SseMessage[];
  closed: () => boolean;
};

function createSink(options: { failWrites?: boolean } = {}): RecordingSink {
  const messages: SseMessage[] = [];
  let isClosed = false;

  return {
    messages,
    write: async (message) => {
      if (options.failWrites) {
        throw new Error("stream closed");
      }
      messages.push(message);
    },
    close: () => {
      isClosed = true;
    },
    closed: () => isClosed,
  };
}

describe("SSE Service", () => {
  let hub: SseHub;

  beforeEach(() => {
    hub = createSseHub();
  });

  // ===========================================================================
  // Client Management
  // ===========================================================================

  describe("getClientCount", () => {
    test("returns 0 when no clients connected", () => {
      expect(hub.getClientCount()).toBe(0);
    });

    test("returns correct count after clients connect", () => {
      hub.addClient(createSink());
      hub.addClient(createSink());
      hub.addClient(createSink());

      expect(hub.getClientCount()).toBe(3);
    });
  });

  describe("addClient", () => {
    test("increments client ID for each new client", () => {
      const id1 = hub.addClient(createSink());
      const id2 = hub.addClient(createSink());

      expect(id1).toBeGreaterThan(0);
      expect(id2).toBeGreaterThan(id1);
    });

    test("sends connected event on registration", () => {
      const sink = createSink();
      const clientId = hub.addClient(sink);

      expect(sink.messages).toEqual([
        { event: "connected", data: JSON.stringify({ clientId }) },
      ]);
    });

    test("drops a client whose writes fail", async () => {
      hub.addClient(createSink({ failWrites: true }));

      await vi.waitFor(() => {
        expect(hub.getClientCount()).toBe(0);
      });
    });
  });

  describe("removeClient", () => {
    test("removes client by ID", () => {
      const clientId = hub.addClient(createSink());
      expect(hub.getClientCount()).toBe(1);

      hub.removeClient(clientId);
      expect(hub.getClientCount()).toBe(0);
    });

    test("does nothing for non-existent client ID", () => {
      hub.addClient(createSink());

      hub.removeClient(99999);
      expect(hub.getClientCount()).toBe(1);
    });
  });

  describe("disconnectAllClients", () => {
    test("closes every client", () => {
      const sinks = [createSink(), createSink()];
      for (const sink of sinks) hub.addClient(sink);

      hub.disconnectAllClients();

      expect(hub.getClientCount()).toBe(0);
      expect(sinks.map((s) => s.closed())).toEqual([true, true]);
    });
  });

  // ===========================================================================
  // Broadcasting
  // ===========================================================================

  describe("broadcast", () => {
    test("sends event to all connected clients", () => {
      const sink1 = createSink();
      const sink2 = createSink();
      hub.addClient(sink1);
      hub.addClient(sink2);

      hub.broadcast({ type: "connection", state: "subscribed", connected: true });

      const expected = {
        event: "connection",
        data: '{"type":"connection","state":"subscribed","connected":true}',
      };
      expect(sink1.messages[1]).toEqual(expected);
      expect(sink2.messages[1]).toEqual(expected);
    });

    test("does nothing when no clients connected", () => {
      expect(() => {
        hub.broadcast({ type: "device_status", devices: { fan: true, light: false, buzzer: false } });
      }).not.toThrow();
    });
  });

  describe("sendToClient", () => {
    test("sends event to specific client only", () => {
      const sink1 = createSink();
      const sink2 = createSink();
      const id1 = hub.addClient(sink1);
      hub.addClient(sink2);

      const sent = hub.sendToClient(id1, {
        type: "device_status",
        devices: { fan: false, light: true, buzzer: false },
      });

      expect(sent).toBe(true);
      expect(sink1.messages.map((m) => m.event)).toEqual(["connected", "device_status"]);
      expect(sink2.messages.map((m) => m.event)).toEqual(["connected"]);
    });

    test("returns false for non-existent client", () => {
      const sent = hub.sendToClient(99999, {
        type: "connection",
        state: "disconnected",
        connected: false,
      });

      expect(sent).toBe(false);
    });
  });

  // ===========================================================================
  // Live Event Wiring
  // ===========================================================================

  describe("bridgeLiveEvents", () => {
    test("forwards cache and connection changes until detached", () => {
      const cache = createLatestStateCache();
      const stateListeners = new Set<StateListener>();
      const subscriber = {
        onStateChange: (listener: StateListener) => {
          stateListeners.add(listener);
          return () => {
            stateListeners.delete(listener);
          };
        },
      };
      const sink = createSink();
      hub.addClient(sink);

      const detach = bridgeLiveEvents(hub, cache, subscriber);
      cache.setReading({ ...EMPTY_READING, temperature: 23 });
      cache.setDeviceState("fan", true);
      for (const listener of stateListeners) listener("subscribed", "connecting");
      detach();
      cache.setDeviceState("fan", false);

      expect(sink.messages.map((m) => m.event)).toEqual([
        "connected",
        "reading",
        "device_status",
        "connection",
      ]);
      expect(JSON.parse(sink.messages[2]?.data ?? "{}")).toEqual({
        type: "device_status",
        devices: { fan: true, light: false, buzzer: false },
      });
      expect(stateListeners.size).toBe(0);
    });
  });
});
