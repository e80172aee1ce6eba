/**
 * MQTT Module - mqtt.js Transport
 *
 * BrokerTransport over the `mqtt` package. The client's own reconnect is
 * disabled (`reconnectPeriod: 0`): each connect() yields one session and
 * the subscriber decides when to try again.
 */
import mqtt from "mqtt";
import type { IClientOptions, MqttClient } from "mqtt";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { TransportError } from "./errors.js";
import {
  connectFailed,
  notConnected,
  publishFailed,
  subscribeFailed,
} from "./errors.js";
import type { BrokerSession, BrokerTransport, MessageHandler, QoS } from "./schema.js";
import { redactBrokerUrl } from "./transform.js";

const log = createLogger("mqtt");

// SUBACK return code for a refused subscription
const SUBACK_FAILURE = 128;

export type MqttTransportOptions = Readonly<{
  brokerUrl: string;
  clientId?: string;
  username?: string;
  password?: string;
  connectTimeoutMs: number;
}>;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function createSession(client: MqttClient): BrokerSession {
  let open = true;

  const closed = new Promise<void>((resolve) => {
    client.once("close", () => {
      open = false;
      resolve();
    });
  });

  // An unhandled "error" event would crash the process
  client.on("error", (error) => {
    log.warn({ error: error.message }, "MQTT client error");
  });

  client.on("offline", () => {
    log.warn("MQTT client offline");
  });

  return {
    closed,

    onMessage(handler: MessageHandler) {
      client.on("message", (topic, payload) => {
        handler(topic, payload);
      });
    },

    async subscribe(topic: string, qos: QoS): Promise<Result<void, TransportError>> {
      if (!open) return err(notConnected());
      try {
        const granted = await client.subscribeAsync(topic, { qos });
        const refused = granted.find((grant) => grant.qos === SUBACK_FAILURE);
        if (refused) {
          return err(subscribeFailed(topic, "Broker refused the subscription"));
        }
        return ok(undefined);
      } catch (error) {
        return err(subscribeFailed(topic, toError(error).message));
      }
    },

    async publish(
      topic: string,
      payload: Buffer,
      qos: QoS,
    ): Promise<Result<void, TransportError>> {
      if (!open) return err(notConnected());
      try {
        await client.publishAsync(topic, payload, { qos });
        return ok(undefined);
      } catch (error) {
        return err(publishFailed(topic, toError(error).message));
      }
    },

    async close() {
      try {
        await client.endAsync();
      } catch (error) {
        log.warn({ error: toError(error).message }, "MQTT client did not close cleanly");
      }
    },
  };
}

/**
 * Create a transport that opens one MQTT connection per connect() call.
 */
export function createMqttTransport(options: MqttTransportOptions): BrokerTransport {
  const broker = redactBrokerUrl(options.brokerUrl);

  const clientOptions: IClientOptions = {
    reconnectPeriod: 0,
    connectTimeout: options.connectTimeoutMs,
    clean: true,
    ...(options.clientId ? { clientId: options.clientId } : {}),
    ...(options.username ? { username: options.username } : {}),
    ...(options.password ? { password: options.password } : {}),
  };

  return {
    async connect(signal: AbortSignal): Promise<Result<BrokerSession, TransportError>> {
      if (signal.aborted) {
        return err(connectFailed(broker, "Aborted before connecting"));
      }

      log.info({ broker }, "Connecting to MQTT broker...");

      let client: MqttClient;
      try {
        client = await mqtt.connectAsync(options.brokerUrl, clientOptions, false);
      } catch (error) {
        const cause = toError(error);
        return err(connectFailed(broker, cause.message, cause));
      }

      const session = createSession(client);

      if (signal.aborted) {
        await session.close();
        return err(connectFailed(broker, "Aborted while connecting"));
      }

      log.info({ broker }, "Connected to MQTT broker");
      return ok(session);
    },
  };
}
