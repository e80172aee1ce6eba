/**
 * MQTT Module - Error Types
 *
 * Broker faults. None of them are fatal: the subscriber reconnects.
 */

export type TransportError =
  | {
      readonly type: "CONNECT_FAILED";
      readonly broker: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "SUBSCRIBE_FAILED";
      readonly topic: string;
      readonly message: string;
    }
  | {
      readonly type: "PUBLISH_FAILED";
      readonly topic: string;
      readonly message: string;
    }
  | {
      readonly type: "NOT_CONNECTED";
      readonly message: string;
    };

/**
 * Create a CONNECT_FAILED error.
 */
export function connectFailed(
  broker: string,
  message: string,
  cause?: Error,
): TransportError {
  if (cause) {
    return { type: "CONNECT_FAILED", broker, message, cause };
  }
  return { type: "CONNECT_FAILED", broker, message };
}

/**
 * Create a SUBSCRIBE_FAILED error.
 */
export function subscribeFailed(topic: string, message: string): TransportError {
  return { type: "SUBSCRIBE_FAILED", topic, message };
}

/**
 * Create a PUBLISH_FAILED error.
 */
export function publishFailed(topic: string, message: string): TransportError {
  return { type: "PUBLISH_FAILED", topic, message };
}

/**
 * Create a NOT_CONNECTED error.
 */
export function notConnected(message = "Broker session is closed"): TransportError {
  return { type: "NOT_CONNECTED", message };
}

/**
 * Format a TransportError for logging.
 */
export function formatTransportError(error: TransportError): string {
  switch (error.type) {
    case "CONNECT_FAILED":
      return `Connect to ${error.broker} failed: ${error.message}`;
    case "SUBSCRIBE_FAILED":
      return `Subscribe to ${error.topic} failed: ${error.message}`;
    case "PUBLISH_FAILED":
      return `Publish to ${error.topic} failed: ${error.message}`;
    case "NOT_CONNECTED":
      return `Not connected: ${error.message}`;
  }
}
