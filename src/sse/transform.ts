/**
 * SSE Module - Pure Transformations
 */
import type { LatestSnapshot, SnapshotChange } from "../cache/index.js";
import type { SubscriberState } from "../mqtt/index.js";
import type { SseEvent, SseMessage, SystemStateEvent } from "./schema.js";

export function toSseMessage(event: SseEvent): SseMessage {
  return { event: event.type, data: JSON.stringify(event) };
}

/**
 * Event for a cache change.
 */
export function snapshotEvent(snapshot: LatestSnapshot, change: SnapshotChange): SseEvent {
  switch (change) {
    case "reading":
      return { type: "reading", reading: snapshot.reading };
    case "devices":
      return { type: "device_status", devices: snapshot.devices };
  }
}

export function connectionEvent(state: SubscriberState): SseEvent {
  return { type: "connection", state, connected: state === "subscribed" };
}

export function systemStateEvent(
  snapshot: LatestSnapshot,
  connection: SubscriberState,
): SystemStateEvent {
  return {
    type: "system_state",
    reading: snapshot.reading,
    devices: snapshot.devices,
    connection,
  };
}
