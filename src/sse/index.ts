/**
 * SSE Module - Public API
 */

// Types
export type {
  ConnectionEvent,
  DeviceStatusEvent,
  ReadingEvent,
  SseEvent,
  SseMessage,
  SseSink,
  SystemStateEvent,
} from "./schema.js";
export type { SseHub } from "./service.js";

// Service functions
export { bridgeLiveEvents, createSseHub } from "./service.js";

// Pure transformations
export { systemStateEvent } from "./transform.js";
