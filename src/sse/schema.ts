/**
 * SSE Module - Schemas and Types
 *
 * Events pushed to dashboard clients.
 */
import type { DeviceStatus, Reading } from "../codec/index.js";
import type { SubscriberState } from "../mqtt/index.js";

// =============================================================================
// SSE Event Types
// =============================================================================

/**
 * A new reading reached the cache.
 */
export type ReadingEvent = Readonly<{
  type: "reading";
  reading: Reading;
}>;

/**
 * Device states changed (operator command or device echo).
 */
export type DeviceStatusEvent = Readonly<{
  type: "device_status";
  devices: DeviceStatus;
}>;

/**
 * Broker connection state of the ingestion subscriber.
 */
export type ConnectionEvent = Readonly<{
  type: "connection";
  state: SubscriberState;
  connected: boolean;
}>;

/**
 * System state snapshot (initial state on connect).
 */
export type SystemStateEvent = Readonly<{
  type: "system_state";
  reading: Reading;
  devices: DeviceStatus;
  connection: SubscriberState;
}>;

/**
 * Union of all SSE event types.
 */
export type SseEvent = ReadingEvent | DeviceStatusEvent | ConnectionEvent | SystemStateEvent;

// =============================================================================
// Clients
// =============================================================================

/**
 * Wire form of one SSE message.
 */
export type SseMessage = Readonly<{
  event: string;
  data: string;
}>;

/**
 * Where a client's messages go. `write` rejects once the client is gone.
 */
export type SseSink = Readonly<{
  write: (message: SseMessage) => Promise<void>;
  close: () => void;
}>;
