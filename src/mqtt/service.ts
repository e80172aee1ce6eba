/**
 * MQTT Module - Ingestion Subscriber
 *
 * Owns the broker connection as an explicit state machine:
 *
 *   disconnected → connecting → subscribed → disconnected (broker loss)
 *   any → stopped (shutdown)
 *
 * Sensor messages update the cache as soon as they are decoded. Store
 * appends run one at a time through a promise chain, so a reading that is
 * waiting on store retries never overtakes or is overtaken by the next one,
 * and the cache never waits on the store.
 */
import type { LatestStateCache } from "../cache/index.js";
import type { Reading } from "../codec/index.js";
import { decodeSensorMessage, formatDecodeError } from "../codec/index.js";
import { createLogger, logOperationFailed } from "../logger.js";
import type { ReadingStore } from "../store/index.js";
import { formatPersistenceError } from "../store/index.js";
import { computeBackoffMs, sleep, untilAborted } from "../timing.js";
import { formatTransportError } from "./errors.js";
import type {
  BrokerSession,
  BrokerTransport,
  OutboundMessage,
  QoS,
  StateListener,
  SubscriberState,
  SubscriberStats,
} from "./schema.js";
import { enqueueBounded } from "./transform.js";

const log = createLogger("mqtt");

// =============================================================================
// Types
// =============================================================================

export type IngestionSubscriberOptions = Readonly<{
  transport: BrokerTransport;
  cache: LatestStateCache;
  store: Pick<ReadingStore, "append">;
  sensorTopic: string;
  qos: QoS;
  reconnect: Readonly<{ baseMs: number; maxMs: number }>;
  storeRetry: Readonly<{ attempts: number; baseMs: number }>;
  /** Commands kept while disconnected; oldest dropped beyond this */
  controlQueueLimit: number;
  now?: () => number;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}>;

export type IngestionSubscriber = Readonly<{
  start: () => void;
  /** Abort the loop, close the session and drain queued messages */
  stop: () => Promise<void>;
  /** Fire-and-forget; queued while not subscribed */
  publish: (topic: string, payload: Buffer) => void;
  getState: () => SubscriberState;
  getStats: () => SubscriberStats;
  onStateChange: (listener: StateListener) => () => void;
}>;

type Counters = {
  reconnectAttempts: number;
  received: number;
  persisted: number;
  decodeFailures: number;
  persistFailures: number;
  published: number;
  droppedCommands: number;
};

// =============================================================================
// Factory
// =============================================================================

export function createIngestionSubscriber(
  options: IngestionSubscriberOptions,
): IngestionSubscriber {
  const { transport, cache, store, sensorTopic, qos } = options;
  const now = options.now ?? Date.now;
  const wait = options.sleep ?? sleep;

  const controller = new AbortController();
  const { signal } = controller;

  let state: SubscriberState = "disconnected";
  let session: BrokerSession | null = null;
  let connectedAt: number | null = null;
  let outbox: OutboundMessage[] = [];
  let inbound: Promise<void> = Promise.resolve();
  let loop: Promise<void> | null = null;

  const listeners = new Set<StateListener>();
  const counters: Counters = {
    reconnectAttempts: 0,
    received: 0,
    persisted: 0,
    decodeFailures: 0,
    persistFailures: 0,
    published: 0,
    droppedCommands: 0,
  };

  function setState(next: SubscriberState): void {
    if (next === state) return;
    const previous = state;
    state = next;
    log.info({ from: previous, to: next }, `Subscriber ${previous} → ${next}`);

    for (const listener of listeners) {
      try {
        listener(next, previous);
      } catch (error) {
        logOperationFailed(log, "stateListener", error);
      }
    }
  }

  // ===========================================================================
  // Inbound
  // ===========================================================================

  async function persist(reading: Reading): Promise<void> {
    const attempts = Math.max(1, options.storeRetry.attempts);

    for (let attempt = 0; attempt < attempts; attempt++) {
      const result = store.append(reading);
      if (result.isOk()) {
        counters.persisted++;
        return;
      }

      const isLast = attempt + 1 >= attempts;
      log.warn(
        { attempt: attempt + 1, attempts, error: formatPersistenceError(result.error) },
        isLast ? "Store append failed, dropping reading" : "Store append failed, retrying",
      );
      if (isLast) break;

      // Uncapped: the attempt count bounds the delay
      const delay = computeBackoffMs(
        attempt,
        options.storeRetry.baseMs,
        Number.POSITIVE_INFINITY,
      );
      await wait(delay, signal);
    }

    counters.persistFailures++;
  }

  /**
   * Decode and apply to the cache synchronously.
   * @returns the reading to persist, or null for acks and bad payloads
   */
  function handleMessage(payload: Buffer, receivedAt: number): Reading | null {
    const decoded = decodeSensorMessage(payload, receivedAt);

    if (decoded.isErr()) {
      counters.decodeFailures++;
      log.warn(
        { errorType: decoded.error.type, bytes: payload.length },
        `Discarding sensor payload: ${formatDecodeError(decoded.error)}`,
      );
      return null;
    }

    const message = decoded.value;

    if (message.kind === "ack") {
      cache.applyDeviceStatus(message.ack.devices);
      return null;
    }

    cache.setReading(message.reading);
    if (message.ack) {
      cache.applyDeviceStatus(message.ack.devices);
    }

    log.debug(
      { deviceId: message.reading.deviceId, timestamp: message.reading.timestamp },
      "Reading received",
    );

    return message.reading;
  }

  function onMessage(topic: string, payload: Buffer): void {
    if (topic !== sensorTopic) {
      log.debug({ topic }, "Ignoring message on unexpected topic");
      return;
    }

    counters.received++;
    const receivedAt = now();

    let reading: Reading | null;
    try {
      reading = handleMessage(payload, receivedAt);
    } catch (error) {
      logOperationFailed(log, "handleMessage", error, { receivedAt });
      return;
    }
    if (reading === null) return;

    const pending = reading;
    inbound = inbound
      .then(() => persist(pending))
      .catch((error: unknown) => {
        logOperationFailed(log, "persist", error, { receivedAt });
      });
  }

  // ===========================================================================
  // Outbound
  // ===========================================================================

  function enqueue(message: OutboundMessage): void {
    const next = enqueueBounded(outbox, message, options.controlQueueLimit);
    outbox = next.queue;
    if (next.dropped > 0) {
      counters.droppedCommands += next.dropped;
      log.warn(
        { dropped: next.dropped, limit: options.controlQueueLimit },
        "Command queue full, dropped oldest",
      );
    }
  }

  async function send(target: BrokerSession, message: OutboundMessage): Promise<void> {
    const result = await target.publish(message.topic, message.payload, qos);

    if (result.isOk()) {
      counters.published++;
      log.debug({ topic: message.topic }, "Command published");
      return;
    }

    log.warn({ error: formatTransportError(result.error) }, "Publish failed, requeueing");
    if (state !== "stopped") {
      enqueue(message);
    }
  }

  function dispatch(target: BrokerSession, message: OutboundMessage): void {
    send(target, message).catch((error: unknown) => {
      logOperationFailed(log, "publish", error, { topic: message.topic });
    });
  }

  function flushOutbox(target: BrokerSession): void {
    if (outbox.length === 0) return;

    const pending = outbox;
    outbox = [];
    log.info({ count: pending.length }, "Flushing queued commands");

    for (const message of pending) {
      dispatch(target, message);
    }
  }

  // ===========================================================================
  // Connection Loop
  // ===========================================================================

  /**
   * One connect + subscribe + receive cycle.
   * @returns true when the session reached `subscribed`
   */
  async function runSession(): Promise<boolean> {
    setState("connecting");

    const connected = await transport.connect(signal);
    if (connected.isErr()) {
      log.warn({ error: formatTransportError(connected.error) }, "Broker connect failed");
      return false;
    }

    const current = connected.value;
    current.onMessage(onMessage);

    const subscribed = await current.subscribe(sensorTopic, qos);
    if (subscribed.isErr() || signal.aborted) {
      if (subscribed.isErr()) {
        log.warn({ error: formatTransportError(subscribed.error) }, "Subscribe failed");
      }
      await current.close();
      return false;
    }

    session = current;
    connectedAt = now();
    log.info({ topic: sensorTopic, qos }, "Subscribed to sensor topic");
    setState("subscribed");
    flushOutbox(current);

    await Promise.race([current.closed, untilAborted(signal)]);

    session = null;
    connectedAt = null;
    await current.close();

    if (!signal.aborted) {
      log.warn("Broker connection lost");
    }
    return true;
  }

  async function run(): Promise<void> {
    let attempt = 0;

    while (!signal.aborted) {
      const reachedSubscribed = await runSession();
      if (signal.aborted) break;

      if (reachedSubscribed) {
        attempt = 0;
      }

      setState("disconnected");

      const delay = computeBackoffMs(
        attempt,
        options.reconnect.baseMs,
        options.reconnect.maxMs,
      );
      attempt++;
      counters.reconnectAttempts++;
      log.info({ delayMs: delay, attempt }, "Reconnecting after backoff");

      await wait(delay, signal);
    }
  }

  // ===========================================================================
  // Public Interface
  // ===========================================================================

  return {
    start: () => {
      if (loop) {
        log.warn("Subscriber already started");
        return;
      }
      loop = run().catch((error: unknown) => {
        logOperationFailed(log, "ingestionLoop", error);
      });
    },

    stop: async () => {
      if (state === "stopped") return;

      controller.abort();
      await loop;
      await inbound;

      outbox = [];
      setState("stopped");
    },

    publish: (topic, payload) => {
      const message = { topic, payload };

      if (state === "stopped") {
        counters.droppedCommands++;
        log.warn({ topic }, "Subscriber stopped, command dropped");
        return;
      }

      if (session && state === "subscribed") {
        dispatch(session, message);
        return;
      }

      log.info({ topic, state }, "Broker not connected, queueing command");
      enqueue(message);
    },

    getState: () => state,

    getStats: () => ({
      state,
      connectedAt,
      ...counters,
      queuedCommands: outbox.length,
    }),

    onStateChange: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
