/**
 * SSE Module - Service Layer
 *
 * Server-Sent Events broadcasting for the live dashboard.
 */
import type { LatestStateCache } from "../cache/index.js";
import { createLogger } from "../logger.js";
import type { IngestionSubscriber } from "../mqtt/index.js";
import type { SseEvent, SseMessage, SseSink } from "./schema.js";
import { connectionEvent, snapshotEvent, toSseMessage } from "./transform.js";

const log = createLogger("sse");

// =============================================================================
// Client Management
// =============================================================================

/**
 * SSE client connection.
 */
type SseClient = {
  id: number;
  sink: SseSink;
  connected: boolean;
};

export type SseHub = Readonly<{
  /** Register a client; it immediately receives a `connected` message */
  addClient: (sink: SseSink) => number;
  removeClient: (clientId: number) => void;
  broadcast: (event: SseEvent) => void;
  sendToClient: (clientId: number, event: SseEvent) => boolean;
  getClientCount: () => number;
  disconnectAllClients: () => void;
}>;

export function createSseHub(): SseHub {
  let clients: SseClient[] = [];
  let nextClientId = 1;

  function getClientCount(): number {
    return clients.filter((c) => c.connected).length;
  }

  function removeClient(clientId: number): void {
    const client = clients.find((c) => c.id === clientId);
    if (client) {
      client.connected = false;
      clients = clients.filter((c) => c.id !== clientId);
      log.info({ clientId, remainingClients: getClientCount() }, "SSE client disconnected");
    }
  }

  function deliver(client: SseClient, message: SseMessage): void {
    client.sink.write(message).catch((error: unknown) => {
      log.debug(
        { clientId: client.id, error: error instanceof Error ? error.message : String(error) },
        "SSE write failed",
      );
      removeClient(client.id);
    });
  }

  return {
    addClient: (sink) => {
      const client: SseClient = { id: nextClientId++, sink, connected: true };
      clients.push(client);
      log.info({ clientId: client.id, totalClients: getClientCount() }, "SSE client connected");

      deliver(client, { event: "connected", data: JSON.stringify({ clientId: client.id }) });
      return client.id;
    },

    removeClient,

    broadcast: (event) => {
      const connectedClients = clients.filter((c) => c.connected);

      if (connectedClients.length === 0) {
        log.debug({ eventType: event.type }, "No clients to broadcast to");
        return;
      }

      const message = toSseMessage(event);
      for (const client of connectedClients) {
        deliver(client, message);
      }

      log.debug({ eventType: event.type, clients: connectedClients.length }, "Event broadcasted");
    },

    sendToClient: (clientId, event) => {
      const client = clients.find((c) => c.id === clientId && c.connected);
      if (!client) return false;

      deliver(client, toSseMessage(event));
      return true;
    },

    getClientCount,

    disconnectAllClients: () => {
      log.info({ clientCount: clients.length }, "Disconnecting all SSE clients...");

      for (const client of clients) {
        client.connected = false;
        client.sink.close();
      }

      clients = [];
    },
  };
}

// =============================================================================
// Live Event Wiring
// =============================================================================

/**
 * Forward cache changes and subscriber state changes to every client.
 *
 * @returns a function that detaches both listeners
 */
export function bridgeLiveEvents(
  hub: SseHub,
  cache: Pick<LatestStateCache, "subscribe">,
  subscriber: Pick<IngestionSubscriber, "onStateChange">,
): () => void {
  const detachCache = cache.subscribe((snapshot, change) => {
    hub.broadcast(snapshotEvent(snapshot, change));
  });

  const detachSubscriber = subscriber.onStateChange((state) => {
    hub.broadcast(connectionEvent(state));
  });

  return () => {
    detachCache();
    detachSubscriber();
  };
}
