/**
 * MQTT Module - Schemas and Types
 *
 * Connection states, transport contract and counters of the ingestion
 * subscriber. The subscriber only talks to a BrokerTransport, so any
 * messaging client can sit underneath it.
 */
import type { Result } from "neverthrow";

import type { TransportError } from "./errors.js";

// =============================================================================
// Connection State
// =============================================================================

/**
 * disconnected → connecting → subscribed → disconnected on broker loss.
 * `stopped` is terminal.
 */
export type SubscriberState = "disconnected" | "connecting" | "subscribed" | "stopped";

export type StateListener = (state: SubscriberState, previous: SubscriberState) => void;

// =============================================================================
// Transport Contract
// =============================================================================

export type QoS = 0 | 1 | 2;

export type MessageHandler = (topic: string, payload: Buffer) => void;

/**
 * One live broker connection. Once `closed` resolves the session is dead;
 * a new one must be obtained from the transport.
 */
export interface BrokerSession {
  subscribe(topic: string, qos: QoS): Promise<Result<void, TransportError>>;
  publish(topic: string, payload: Buffer, qos: QoS): Promise<Result<void, TransportError>>;
  onMessage(handler: MessageHandler): void;
  /** Resolves when the connection is lost or closed */
  readonly closed: Promise<void>;
  /** Idempotent, never rejects */
  close(): Promise<void>;
}

export interface BrokerTransport {
  connect(signal: AbortSignal): Promise<Result<BrokerSession, TransportError>>;
}

// =============================================================================
// Counters
// =============================================================================

export type SubscriberStats = Readonly<{
  state: SubscriberState;
  /** Epoch ms of the current subscription, null while not subscribed */
  connectedAt: number | null;
  reconnectAttempts: number;
  received: number;
  persisted: number;
  decodeFailures: number;
  persistFailures: number;
  published: number;
  droppedCommands: number;
  queuedCommands: number;
}>;

/**
 * Command waiting for a connection.
 */
export type OutboundMessage = Readonly<{
  topic: string;
  payload: Buffer;
}>;
