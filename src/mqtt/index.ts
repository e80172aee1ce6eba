/**
 * MQTT Module - Public API
 *
 * Ingestion subscriber, its transport contract and the mqtt.js transport.
 */

// Types
export type {
  BrokerSession,
  BrokerTransport,
  MessageHandler,
  QoS,
  StateListener,
  SubscriberState,
  SubscriberStats,
} from "./schema.js";
export type { TransportError } from "./errors.js";
export type { IngestionSubscriber, IngestionSubscriberOptions } from "./service.js";
export type { MqttTransportOptions } from "./transport.js";

// Error utilities
export { formatTransportError } from "./errors.js";

// Service functions
export { createIngestionSubscriber } from "./service.js";
export { createMqttTransport } from "./transport.js";

// Pure transformations
export { redactBrokerUrl } from "./transform.js";
