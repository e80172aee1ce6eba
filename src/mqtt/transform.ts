/**
 * MQTT Module - Pure Transformations
 */
import type { OutboundMessage } from "./schema.js";

/**
 * Append to a bounded FIFO, dropping the oldest entries beyond `limit`.
 *
 * @example
 * enqueueBounded([a, b], c, 2) // { queue: [b, c], dropped: 1 }
 */
export function enqueueBounded(
  queue: ReadonlyArray<OutboundMessage>,
  message: OutboundMessage,
  limit: number,
): { queue: OutboundMessage[]; dropped: number } {
  const next = [...queue, message];
  const bound = Math.max(0, Math.floor(limit));
  const dropped = Math.max(0, next.length - bound);
  return { queue: next.slice(dropped), dropped };
}

/**
 * Strip credentials from a broker URL before it is logged.
 *
 * @example
 * redactBrokerUrl("mqtt://user:pw@host:1883") // "mqtt://host:1883"
 */
export function redactBrokerUrl(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.username = "";
    parsed.password = "";
    return parsed.toString().replace(/\/$/, "");
  } catch {
    return url;
  }
}
